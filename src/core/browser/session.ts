/**
 * Browser session management for Playwright.
 * One persistent profile per seller account, so logins survive restarts.
 */

import { chromium, BrowserContext, Page } from "playwright";
import * as fs from "fs";
import { createDebugLogger } from "../utils/debug";

const debug = createDebugLogger("session");

export interface SessionOptions {
  /** Account label, used in logs and errors. */
  label: string;
  userDataDir: string;
  headless?: boolean;
  timeout?: number;
}

export interface ScrollOptions {
  steps?: number;
  pauseMs?: number;
}

/**
 * Rendered page HTML captured at one point in time.
 */
export interface PageSnapshot {
  html: string;
  url: string;
  title: string;
}

/**
 * Browser session bound to one seller account profile.
 */
export class BrowserSession {
  private context: BrowserContext | null = null;
  private page: Page | null = null;

  private options: Required<SessionOptions>;

  constructor(options: SessionOptions) {
    this.options = {
      label: options.label,
      userDataDir: options.userDataDir,
      headless: options.headless ?? false,
      timeout: options.timeout ?? 30000,
    };
  }

  get label(): string {
    return this.options.label;
  }

  /**
   * Launch the persistent context if it is not running yet.
   */
  async initialize(): Promise<void> {
    if (this.context) {
      return;
    }

    if (!fs.existsSync(this.options.userDataDir)) {
      fs.mkdirSync(this.options.userDataDir, { recursive: true });
    }

    debug(`Launching browser for ${this.label} (${this.options.userDataDir})`);
    this.context = await chromium.launchPersistentContext(
      this.options.userDataDir,
      {
        // Logins happen in the visible window
        headless: this.options.headless,
        viewport: { width: 1280, height: 800 },
      },
    );
    this.context.setDefaultTimeout(this.options.timeout);
  }

  /**
   * Get the current page, initializing if needed.
   */
  async getPage(): Promise<Page> {
    await this.initialize();
    if (!this.context) {
      throw new Error(`Browser context for ${this.label} failed to start`);
    }
    if (!this.page || this.page.isClosed()) {
      const pages = this.context.pages();
      this.page = pages[0] || (await this.context.newPage());
    }
    return this.page;
  }

  /**
   * Navigate to a URL and wait for the body to exist.
   * Returns the URL the page ended up on after redirects.
   */
  async navigateTo(
    url: string,
    waitUntil: "load" | "domcontentloaded" | "networkidle" = "domcontentloaded",
  ): Promise<string> {
    const page = await this.getPage();
    await page.goto(url, { waitUntil, timeout: 60000 });
    await page.waitForSelector("body", { timeout: this.options.timeout });
    return page.url();
  }

  /**
   * Wait until the page title mentions one of the given phrases.
   * Returns false on timeout.
   */
  async waitForTitle(phrases: string[], timeoutMs = 10000): Promise<boolean> {
    const page = await this.getPage();
    const startTime = Date.now();

    while (Date.now() - startTime < timeoutMs) {
      const title = await page.title().catch(() => "");
      if (phrases.some((p) => title.includes(p))) {
        return true;
      }
      await page.waitForTimeout(250);
    }
    return false;
  }

  /**
   * Scroll to the bottom repeatedly so lazy-loaded rows render.
   */
  async scrollToBottom(options: ScrollOptions = {}): Promise<void> {
    const { steps = 6, pauseMs = 500 } = options;
    const page = await this.getPage();

    for (let i = 0; i < steps; i++) {
      await page.evaluate(() => {
        window.scrollBy(0, document.body.scrollHeight);
      });
      await page.waitForTimeout(pauseMs);
    }
  }

  /**
   * Wait for the user to complete login manually in the visible window.
   */
  async waitForManualLogin(
    isLoginPage: (url: string) => boolean,
    timeoutMs = 300000,
  ): Promise<boolean> {
    const page = await this.getPage();
    const startTime = Date.now();

    debug(`Waiting up to ${timeoutMs / 1000}s for ${this.label} to log in`);
    while (Date.now() - startTime < timeoutMs) {
      if (!isLoginPage(page.url())) {
        return true;
      }
      await page.waitForTimeout(1000);
    }

    return false;
  }

  /**
   * Capture the rendered HTML of the current page.
   */
  async snapshot(): Promise<PageSnapshot> {
    const page = await this.getPage();
    return {
      html: await page.content(),
      url: page.url(),
      title: await page.title(),
    };
  }

  /**
   * Close the browser session.
   */
  async close(): Promise<void> {
    if (this.context) {
      await this.context.close();
    }
    this.context = null;
    this.page = null;
  }
}

/**
 * Sessions keyed by account label, reused across tool calls.
 */
const sessions = new Map<string, BrowserSession>();

/**
 * Get or create the session for an account.
 */
export function getSession(options: SessionOptions): BrowserSession {
  let session = sessions.get(options.label);
  if (!session) {
    session = new BrowserSession(options);
    sessions.set(options.label, session);
  }
  return session;
}

/**
 * Close every open session.
 */
export async function closeAllSessions(): Promise<void> {
  const open = [...sessions.values()];
  sessions.clear();
  await Promise.all(open.map((s) => s.close()));
}
