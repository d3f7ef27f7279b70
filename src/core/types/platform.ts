import type { Page } from "playwright";

/**
 * Order list filter offered by a seller platform.
 */
export interface OrderStatusFilter {
  /** Code used in tool arguments and config, e.g. "awaiting_shipment". */
  code: string;
  /** Value the platform expects in its URL, e.g. "AWAITING_SHIPMENT". */
  filter: string;
  label: string;
}

/**
 * Authentication status.
 */
export interface AuthStatus {
  authenticated: boolean;
  source: string;
  url?: string;
  message?: string;
}

/**
 * Seller platform plugin interface.
 * Implement this interface to add support for another marketplace.
 */
export interface ISellerPlatformPlugin {
  readonly name: string;
  readonly slug: string;
  readonly statusFilters: OrderStatusFilter[];

  getLoginUrl(): string;
  getOrdersUrl(status: string): string;
  isLoginPage(url: string): boolean;
  checkAuthStatus(page: Page, source: string): Promise<AuthStatus>;
}

/**
 * Base class for seller platform plugins with common functionality.
 */
export abstract class BaseSellerPlatformPlugin implements ISellerPlatformPlugin {
  abstract readonly name: string;
  abstract readonly slug: string;
  abstract readonly statusFilters: OrderStatusFilter[];

  abstract getLoginUrl(): string;
  abstract getOrdersUrl(status: string): string;
  abstract checkAuthStatus(page: Page, source: string): Promise<AuthStatus>;

  getStatusFilter(code: string): OrderStatusFilter | undefined {
    const normalized = code.toLowerCase();
    return this.statusFilters.find((s) => s.code === normalized);
  }

  isLoginPage(url: string): boolean {
    const lower = url.toLowerCase();
    return lower.includes("signin") || lower.includes("login");
  }
}
