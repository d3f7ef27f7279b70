/**
 * Debug logging.
 *
 * stdout carries the MCP transport, so everything goes to stderr and to an
 * append-only log file that can be tailed while a scrape runs.
 */

import { appendFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";

export type DebugLogger = (msg: string) => void;

export function getDebugLogPath(): string {
  return (
    process.env.SELLER_ORDERS_DEBUG_LOG ||
    join(tmpdir(), "seller-orders-mcp-debug.log")
  );
}

/**
 * Create a logger that prefixes every line with its scope.
 */
export function createDebugLogger(scope: string): DebugLogger {
  return (msg: string): void => {
    const line = `[${new Date().toISOString()}] [${scope}] ${msg}\n`;
    try {
      appendFileSync(getDebugLogPath(), line);
    } catch {
      // log file is best effort
    }
    console.error(`[${scope}] ${msg}`);
  };
}
