/**
 * eBay Seller Hub adapter implementing ISellerPlatformPlugin.
 */

import type { Page } from "playwright";
import {
  AuthStatus,
  BaseSellerPlatformPlugin,
  OrderStatusFilter,
} from "../core/types";
import type { BrowserSession, PageSnapshot } from "../core/browser/session";
import { createDebugLogger } from "../core/utils/debug";
import { ORDER_STATUS_FILTERS, SELLER_HUB_ORDERS_URL } from "./statuses";

const debug = createDebugLogger("ebay");

/**
 * The orders page needs a logged-in account and the user did not log in.
 */
export class AuthRequiredError extends Error {
  constructor(
    readonly source: string,
    readonly loginUrl: string,
  ) {
    super(`Login required for ${source}. Log in at ${loginUrl} and retry.`);
    this.name = "AuthRequiredError";
  }
}

export interface CaptureOptions {
  /** How long to wait for a manual login in the visible window (default: 5 min). */
  loginTimeoutMs?: number;
  scrollSteps?: number;
  scrollPauseMs?: number;
}

/**
 * eBay seller platform plugin.
 */
export class EbaySellerPlugin extends BaseSellerPlatformPlugin {
  readonly name = "eBay";
  readonly slug = "ebay";
  readonly statusFilters: OrderStatusFilter[] = ORDER_STATUS_FILTERS;

  getLoginUrl(): string {
    return "https://signin.ebay.com/ws/eBayISAPI.dll?SignIn";
  }

  /**
   * Orders page URL for a status code. Unknown codes fall back to all orders.
   */
  getOrdersUrl(status: string): string {
    const filter = this.getStatusFilter(status)?.filter ?? "ALL_ORDERS";
    const params = new URLSearchParams({ filter: `status:${filter}` });
    return `${SELLER_HUB_ORDERS_URL}?${params.toString()}`;
  }

  /**
   * Check whether the account behind a page is logged in.
   */
  async checkAuthStatus(page: Page, source: string): Promise<AuthStatus> {
    try {
      const currentUrl = page.url();
      if (!currentUrl.includes("ebay.")) {
        await page.goto(this.getOrdersUrl("all"), {
          waitUntil: "domcontentloaded",
          timeout: 60000,
        });
      }

      const url = page.url();
      if (this.isLoginPage(url)) {
        return {
          authenticated: false,
          source,
          url,
          message: "Not logged in - sign in required",
        };
      }

      return { authenticated: true, source, url, message: "Authenticated" };
    } catch (error) {
      return {
        authenticated: false,
        source,
        message: `Error checking auth: ${error}`,
      };
    }
  }

  /**
   * Open the orders page for a status, wait out a login if needed, let lazy
   * rows load, and capture the rendered HTML.
   */
  async captureOrdersPage(
    session: BrowserSession,
    status: string,
    options: CaptureOptions = {},
  ): Promise<PageSnapshot> {
    const url = this.getOrdersUrl(status);
    debug(`[${session.label}] Opening ${url}`);

    const landedOn = await session.navigateTo(url);
    if (this.isLoginPage(landedOn)) {
      debug(`[${session.label}] Redirected to sign-in`);
      const loggedIn = await session.waitForManualLogin(
        (u) => this.isLoginPage(u),
        options.loginTimeoutMs,
      );
      if (!loggedIn) {
        throw new AuthRequiredError(session.label, this.getLoginUrl());
      }
      await session.navigateTo(url);
    }

    const settled = await session.waitForTitle(["Awaiting shipment", "Orders"]);
    if (!settled) {
      debug(`[${session.label}] Title did not settle, continuing anyway`);
    }

    await session.scrollToBottom({
      steps: options.scrollSteps,
      pauseMs: options.scrollPauseMs,
    });

    const snapshot = await session.snapshot();
    debug(
      `[${session.label}] Captured ${snapshot.html.length} bytes from "${snapshot.title}"`,
    );
    return snapshot;
  }
}
