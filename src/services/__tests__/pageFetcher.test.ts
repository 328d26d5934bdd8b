import { errors } from "playwright";
import { describe, expect, it, vi } from "vitest";
import { FetchTimeoutError, NavigationError } from "../../errors";
import {
  openBrowserSession,
  PlaywrightPageFetcher,
  type ActionLocator,
  type BrowserPage,
  type LaunchedBrowser
} from "../pageFetcher";
import { SEARCH_URL, testConfig } from "./fakes";

function fakePage(overrides: Partial<BrowserPage> = {}) {
  const calls: string[] = [];
  const locatorFor = (selector: string): ActionLocator => ({
    waitFor: vi.fn(async () => {
      calls.push(`attached ${selector}`);
    }),
    fill: vi.fn(async (value: string) => {
      calls.push(`fill ${selector} ${value}`);
    }),
    click: vi.fn(async () => {
      calls.push(`click ${selector}`);
    })
  });
  const page: BrowserPage = {
    goto: vi.fn(async (url: string) => {
      calls.push(`goto ${url}`);
      return null;
    }),
    locator: (selector: string) => ({ first: () => locatorFor(selector) }),
    waitForSelector: vi.fn(async (selector: string) => {
      calls.push(`wait ${selector}`);
      return null;
    }),
    url: () => `${SEARCH_URL}?q=ACME`,
    content: async () => "<html><body>results</body></html>",
    ...overrides
  };
  return { page, calls };
}

describe("PlaywrightPageFetcher", () => {
  it("runs the form actions after navigation and before the wait", async () => {
    const { page, calls } = fakePage();

    const content = await new PlaywrightPageFetcher(page).fetch({
      url: SEARCH_URL,
      waitFor: "table tbody tr",
      timeoutMs: 1000,
      actions: [
        { kind: "fill", selector: "input", value: "ACME" },
        { kind: "click", selector: "button" }
      ]
    });

    expect(calls).toEqual([
      `goto ${SEARCH_URL}`,
      "attached input",
      "fill input ACME",
      "attached button",
      "click button",
      "wait table tbody tr"
    ]);
    expect(content).toEqual({
      url: `${SEARCH_URL}?q=ACME`,
      html: "<html><body>results</body></html>"
    });
  });

  it("reports a wait that never settles as a timeout", async () => {
    const { page } = fakePage({
      waitForSelector: async () => {
        throw new errors.TimeoutError("waiting for selector");
      }
    });

    const error = await new PlaywrightPageFetcher(page)
      .fetch({ url: SEARCH_URL, waitFor: "table", timeoutMs: 1000 })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(FetchTimeoutError);
    if (!(error instanceof FetchTimeoutError)) return;
    expect(error.message).toBe(`Timed out after 1000ms loading ${SEARCH_URL}`);
  });

  it("reports any other failure as a navigation error", async () => {
    const { page } = fakePage({
      goto: async () => {
        throw new Error("net::ERR_NAME_NOT_RESOLVED");
      }
    });

    const error = await new PlaywrightPageFetcher(page)
      .fetch({ url: SEARCH_URL, waitFor: "table", timeoutMs: 1000 })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(NavigationError);
    expect(error).not.toBeInstanceOf(FetchTimeoutError);
  });
});

describe("openBrowserSession", () => {
  it("passes the user agent and closes the browser on close()", async () => {
    const { page } = fakePage();
    const newContext = vi.fn(async (_options: { userAgent?: string }) => ({
      newPage: async () => page
    }));
    const browser: LaunchedBrowser = { newContext, close: vi.fn(async () => undefined) };
    const launch = vi.fn(async (_options: { headless: boolean }) => browser);

    const session = await openBrowserSession(testConfig({ userAgent: "test-agent", headless: false }), launch);
    await session.close();

    expect(launch).toHaveBeenCalledWith({ headless: false });
    expect(newContext).toHaveBeenCalledWith({ userAgent: "test-agent" });
    expect(browser.close).toHaveBeenCalledTimes(1);
  });

  it("closes the browser when the page cannot be opened", async () => {
    const close = vi.fn(async () => undefined);
    const browser: LaunchedBrowser = {
      newContext: async () => {
        throw new Error("context refused");
      },
      close
    };

    await expect(openBrowserSession(testConfig(), async () => browser)).rejects.toThrow(
      "context refused"
    );
    expect(close).toHaveBeenCalledTimes(1);
  });
});
