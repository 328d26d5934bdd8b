import { chromium, errors } from "playwright";
import type { ScraperConfig } from "../config/config";
import { FetchTimeoutError, NavigationError, toErrorMessage } from "../errors";
import { logger } from "../utils/logger";

export type PageAction =
  | { kind: "fill"; selector: string; value: string }
  | { kind: "click"; selector: string };

export interface FetchRequest {
  url: string;
  /** CSS selector that must be attached before the page counts as loaded. */
  waitFor: string;
  timeoutMs: number;
  /** Interactions run after navigation and before the wait. */
  actions?: PageAction[];
}

export interface RenderedContent {
  /** Final URL after redirects and form submission. */
  url: string;
  html: string;
}

/**
 * Resolves with fully rendered markup or rejects with
 * FetchTimeoutError / NavigationError. Never resolves with a page whose
 * wait condition did not settle.
 */
export interface PageFetcher {
  fetch(request: FetchRequest): Promise<RenderedContent>;
}

export interface BrowserSession {
  fetcher: PageFetcher;
  close(): Promise<void>;
}

export type SessionFactory = () => Promise<BrowserSession>;

/** The slice of Playwright's Locator the fetcher drives. */
export interface ActionLocator {
  waitFor(options: { state: "attached"; timeout: number }): Promise<void>;
  fill(value: string, options: { force: boolean; timeout: number }): Promise<void>;
  click(options: { force: boolean; timeout: number }): Promise<void>;
}

/** The slice of Playwright's Page the fetcher drives. */
export interface BrowserPage {
  goto(url: string, options: { waitUntil: "domcontentloaded"; timeout: number }): Promise<unknown>;
  locator(selector: string): { first(): ActionLocator };
  waitForSelector(selector: string, options: { state: "attached"; timeout: number }): Promise<unknown>;
  url(): string;
  content(): Promise<string>;
}

export interface LaunchedBrowser {
  newContext(options: { userAgent?: string }): Promise<{ newPage(): Promise<BrowserPage> }>;
  close(): Promise<void>;
}

export type BrowserLauncher = (options: { headless: boolean }) => Promise<LaunchedBrowser>;

const launchChromium: BrowserLauncher = (options) => chromium.launch(options);

export class PlaywrightPageFetcher implements PageFetcher {
  constructor(private readonly page: BrowserPage) {}

  async fetch(request: FetchRequest): Promise<RenderedContent> {
    const { url, waitFor, timeoutMs, actions = [] } = request;

    try {
      logger.debug(`Navigating to ${url}`);
      await this.page.goto(url, { waitUntil: "domcontentloaded", timeout: timeoutMs });

      for (const action of actions) {
        const locator = this.page.locator(action.selector).first();
        await locator.waitFor({ state: "attached", timeout: timeoutMs });
        if (action.kind === "fill") {
          await locator.fill(action.value, { force: true, timeout: timeoutMs });
        } else {
          // the site keeps its search button disabled until its own validation runs
          await locator.click({ force: true, timeout: timeoutMs });
        }
      }

      await this.page.waitForSelector(waitFor, { state: "attached", timeout: timeoutMs });
      return { url: this.page.url(), html: await this.page.content() };
    } catch (err) {
      if (err instanceof errors.TimeoutError) {
        throw new FetchTimeoutError(url, timeoutMs, { cause: err });
      }
      throw new NavigationError(url, toErrorMessage(err), { cause: err });
    }
  }
}

export async function openBrowserSession(
  cfg: ScraperConfig,
  launch: BrowserLauncher = launchChromium
): Promise<BrowserSession> {
  logger.info(`Launching browser (headless=${cfg.headless})...`);
  const browser = await launch({ headless: cfg.headless });

  try {
    const context = await browser.newContext(
      cfg.userAgent ? { userAgent: cfg.userAgent } : {}
    );
    const page = await context.newPage();

    return {
      fetcher: new PlaywrightPageFetcher(page),
      close: async () => {
        logger.info("Closing browser...");
        await browser.close();
      }
    };
  } catch (err) {
    await browser.close();
    throw err;
  }
}
