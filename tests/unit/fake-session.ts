import * as fs from "fs";
import {
  describeLocator,
  ElementNotFoundError,
  NotInteractableError,
  SessionError,
  WaitTimeoutError,
} from "../../Scripts/errors";
import type { BrowserSession, Locator, PageElement } from "../../Scripts/session";
import { LAB_SITE } from "../../Scripts/site";

export type FakeElement = {
  matches: Locator[];
  attributes?: Record<string, string>;
  visible?: boolean;
  enabled?: boolean;
  covered?: boolean;
  appearsAfterMs?: number;
  enabledAfterMs?: number;
  navigatesTo?: string;
};

export type FakePage = { title: string; elements: FakeElement[] };
export type FakeSite = Record<string, FakePage>;

export const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

const same = (a: Locator, b: Locator) => a.by === b.by && a.value === b.value;

/**
 * In-memory stand-in for a browser. Waits run on a virtual clock that
 * restarts at every navigation, so nothing actually sleeps.
 */
export class FakeSession implements BrowserSession {
  url = "about:blank";
  elapsedMs = 0;
  closeCalls = 0;
  clicked: Locator[] = [];
  pauses: number[] = [];

  constructor(
    private readonly site: FakeSite,
    private readonly faults: Partial<Record<keyof BrowserSession, Error>> = {}
  ) {}

  private fault(op: keyof BrowserSession) {
    const e = this.faults[op];
    if (e) throw e;
  }

  private get page(): FakePage {
    const page = this.site[this.url];
    if (!page) throw new SessionError(`Nothing served at ${this.url}`);
    return page;
  }

  private lookup(locator: Locator) {
    return this.page.elements.find((el) => el.matches.some((m) => same(m, locator)));
  }

  private go(url: string) {
    this.url = url;
    this.elapsedMs = 0;
  }

  private handle(el: FakeElement, locator: Locator): PageElement {
    return {
      getAttribute: async (name) => el.attributes?.[name] ?? null,
      click: async () => {
        const blocked = el.enabled === false || el.visible === false || el.covered;
        if (blocked || (el.enabledAfterMs ?? 0) > this.elapsedMs) throw new NotInteractableError(locator);
        this.clicked.push(locator);
        if (el.navigatesTo) this.go(el.navigatesTo);
      },
    };
  }

  // Resolves once `readyAt(el)` falls inside the window, otherwise burns the whole timeout
  private waitFor(
    locator: Locator,
    timeoutMs: number,
    readyAt: (el: FakeElement) => number | null,
    condition: string
  ) {
    const el = this.lookup(locator);
    const due = el ? readyAt(el) : null;
    if (!el || due === null || due > this.elapsedMs + timeoutMs) {
      this.elapsedMs += timeoutMs;
      throw new WaitTimeoutError(condition, timeoutMs);
    }
    this.elapsedMs = Math.max(this.elapsedMs, due);
    return this.handle(el, locator);
  }

  async navigate(url: string) {
    this.fault("navigate");
    this.go(url);
  }

  async title() {
    return this.page.title;
  }

  async currentUrl() {
    return this.url;
  }

  async find(locator: Locator) {
    this.fault("find");
    const el = this.lookup(locator);
    if (!el || (el.appearsAfterMs ?? 0) > this.elapsedMs) throw new ElementNotFoundError(locator);
    return this.handle(el, locator);
  }

  async waitForPresent(locator: Locator, timeoutMs: number) {
    this.fault("waitForPresent");
    return this.waitFor(
      locator,
      timeoutMs,
      (el) => el.appearsAfterMs ?? 0,
      `presence of ${describeLocator(locator)}`
    );
  }

  async waitForClickable(locator: Locator, timeoutMs: number) {
    this.fault("waitForClickable");
    return this.waitFor(
      locator,
      timeoutMs,
      (el) =>
        el.visible === false || el.enabled === false || el.covered
          ? null
          : Math.max(el.appearsAfterMs ?? 0, el.enabledAfterMs ?? 0),
      `${describeLocator(locator)} to be clickable`
    );
  }

  async waitForUrlContains(fragment: string, timeoutMs: number) {
    if (!this.url.includes(fragment)) {
      this.elapsedMs += timeoutMs;
      throw new WaitTimeoutError(`URL to contain "${fragment}"`, timeoutMs);
    }
  }

  async screenshot(file: string) {
    this.fault("screenshot");
    fs.writeFileSync(file, PNG_SIGNATURE);
  }

  async pause(ms: number) {
    this.pauses.push(ms);
    this.elapsedMs += ms;
  }

  async close() {
    this.closeCalls++;
  }
}

export const NEWS_URL = "https://lab.fi/en/news-and-stories";

/** The front page and news page as the checks expect them, with per-test tweaks. */
export function labPages(
  opts: { consent?: FakeElement | null; meta?: Partial<FakeElement>; newsLinkTo?: string } = {}
): FakeSite {
  const meta: FakeElement = {
    matches: [LAB_SITE.metaDescription.xpath, LAB_SITE.metaDescription.css],
    attributes: { name: "description", content: LAB_SITE.expectedDescription },
    ...opts.meta,
  };
  const consent = opts.consent === undefined ? { matches: [LAB_SITE.consentReject] } : opts.consent;

  const elements: FakeElement[] = [meta, { matches: [LAB_SITE.newsLink], navigatesTo: opts.newsLinkTo ?? NEWS_URL }];
  if (consent) elements.push(consent);

  return {
    [LAB_SITE.url]: { title: "LAB University of Applied Sciences | LAB.fi", elements },
    [NEWS_URL]: { title: "News and Stories | LAB.fi", elements: [] },
    "https://lab.fi/en/studies": { title: "Studies | LAB.fi", elements: [] },
  };
}
