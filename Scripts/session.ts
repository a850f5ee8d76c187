import {
  errors,
  type Browser,
  type ElementHandle,
  type Locator as Target,
  type Page,
} from "playwright";
import { launchBrowser, safeGoto } from "./helpers";
import { describeLocator, ElementNotFoundError, SessionError, WaitTimeoutError } from "./errors";

export type Locator = {
  by: "css" | "xpath" | "id";
  value: string;
};

export const css = (value: string): Locator => ({ by: "css", value });
export const xpath = (value: string): Locator => ({ by: "xpath", value });
export const byId = (value: string): Locator => ({ by: "id", value });

export interface PageElement {
  getAttribute(name: string): Promise<string | null>;
  click(): Promise<void>;
}

/**
 * One browser, one page. Created per check and closed when the check is done.
 *
 * `find` looks the element up once; the `waitFor*` calls poll until their
 * timeout and then reject with a `WaitTimeoutError`.
 */
export interface BrowserSession {
  navigate(url: string): Promise<void>;
  title(): Promise<string>;
  currentUrl(): Promise<string>;
  find(locator: Locator): Promise<PageElement>;
  waitForPresent(locator: Locator, timeoutMs: number): Promise<PageElement>;
  waitForClickable(locator: Locator, timeoutMs: number): Promise<PageElement>;
  waitForUrlContains(fragment: string, timeoutMs: number): Promise<void>;
  screenshot(file: string): Promise<void>;
  pause(ms: number): Promise<void>;
  close(): Promise<void>;
}

export type SessionLauncher = () => Promise<BrowserSession>;

// Playwright's own engines cover all three: css=, xpath= and id=
function selectorFor(locator: Locator) {
  return `${locator.by}=${locator.value}`;
}

function wrap<T extends Node>(handle: ElementHandle<T>): PageElement {
  return {
    getAttribute: (name) => handle.getAttribute(name),
    click: () => handle.click(),
  };
}

async function bounded<T>(condition: string, timeoutMs: number, wait: () => Promise<T>) {
  try {
    return await wait();
  } catch (e) {
    if (e instanceof errors.TimeoutError) {
      throw new WaitTimeoutError(condition, timeoutMs, { cause: e });
    }
    throw e;
  }
}

// The click shares the deadline of the wait that found the element
function clickable(target: Target, condition: string, timeoutMs: number, deadline: number): PageElement {
  // timeout 0 means "no timeout" to Playwright
  const remaining = () => Math.max(1, deadline - Date.now());
  return {
    getAttribute: (name) =>
      bounded(condition, timeoutMs, () => target.getAttribute(name, { timeout: remaining() })),
    click: () => bounded(condition, timeoutMs, () => target.click({ timeout: remaining() })),
  };
}

class PlaywrightSession implements BrowserSession {
  constructor(private readonly page: Page, private readonly owner?: Browser) {}

  async navigate(url: string) {
    await safeGoto(this.page, url);
  }

  title() {
    return this.page.title();
  }

  async currentUrl() {
    return this.page.url();
  }

  async find(locator: Locator) {
    const handle = await this.page.$(selectorFor(locator));
    if (!handle) throw new ElementNotFoundError(locator);
    return wrap(handle);
  }

  async waitForPresent(locator: Locator, timeoutMs: number) {
    const handle = await bounded(`presence of ${describeLocator(locator)}`, timeoutMs, () =>
      this.page.waitForSelector(selectorFor(locator), { state: "attached", timeout: timeoutMs })
    );
    return wrap(handle);
  }

  // A trial click polls for visible, stable, enabled and not covered, without clicking
  async waitForClickable(locator: Locator, timeoutMs: number) {
    const deadline = Date.now() + timeoutMs;
    const condition = `${describeLocator(locator)} to be clickable`;
    const target = this.page.locator(selectorFor(locator)).first();
    await bounded(condition, timeoutMs, () => target.click({ trial: true, timeout: timeoutMs }));
    return clickable(target, condition, timeoutMs, deadline);
  }

  // "commit": the URL is enough, the new page need not finish loading
  async waitForUrlContains(fragment: string, timeoutMs: number) {
    await bounded(`URL to contain "${fragment}"`, timeoutMs, () =>
      this.page.waitForURL((url) => url.href.includes(fragment), {
        timeout: timeoutMs,
        waitUntil: "commit",
      })
    );
  }

  async screenshot(file: string) {
    await this.page.screenshot({ path: file, fullPage: true });
  }

  async pause(ms: number) {
    await this.page.waitForTimeout(ms);
  }

  async close() {
    if (this.owner) await this.owner.close();
    else await this.page.close();
  }
}

/** Wraps an open page. Closing the session closes `owner` when given, else just the page. */
export function sessionFromPage(page: Page, owner?: Browser): BrowserSession {
  return new PlaywrightSession(page, owner);
}

export async function launchSession(): Promise<BrowserSession> {
  let browser: Browser;
  try {
    browser = await launchBrowser();
  } catch (e) {
    throw new SessionError("Could not launch the browser", { cause: e });
  }

  try {
    // null viewport follows the (maximized) window size
    const context = await browser.newContext({ viewport: null });
    const page = await context.newPage();
    return sessionFromPage(page, browser);
  } catch (e) {
    await browser.close();
    throw new SessionError("Could not open a page", { cause: e });
  }
}

/** Runs `run` against a fresh session and closes it on every way out. */
export async function withSession<T>(
  launch: SessionLauncher,
  run: (session: BrowserSession) => Promise<T>
): Promise<T> {
  const session = await launch();
  try {
    return await run(session);
  } finally {
    await session.close();
  }
}
