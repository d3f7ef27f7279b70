export * from "./order-line";
export * from "./platform";
