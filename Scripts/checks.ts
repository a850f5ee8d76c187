import { CheckFailedError, isLookupMiss } from "./errors";
import { OUTPUT_DIR, PAUSE_MS, screenshotPath } from "./helpers";
import type { BrowserSession, Locator } from "./session";
import {
  CONSENT_WAIT_MS,
  LAB_SITE,
  META_WAIT_MS,
  NAVIGATION_WAIT_MS,
  SCREENSHOT_PREFIX,
  type Site,
} from "./site";

export type CheckOptions = {
  site?: Site;
  pauseMs?: number; // demo pacing, off unless PAUSE_MS is set
  outputDir?: string;
  now?: () => number;
};

export type ConsentOutcome = "dismissed" | "not-present-or-not-clickable";

export type CheckName = "title" | "meta-description" | "navigation" | "front-page";

export type Check = {
  name: CheckName;
  description: string;
  run: (session: BrowserSession, options?: CheckOptions) => Promise<unknown>;
};

async function pace(session: BrowserSession, options: CheckOptions) {
  const ms = options.pauseMs ?? PAUSE_MS;
  if (ms > 0) await session.pause(ms);
}

async function open(session: BrowserSession, options: CheckOptions) {
  await session.navigate((options.site ?? LAB_SITE).url);
  await pace(session, options);
}

export async function checkTitle(session: BrowserSession, options: CheckOptions = {}) {
  const site = options.site ?? LAB_SITE;
  console.log("Checking for correct page title");

  await open(session, options);
  const title = await session.title();
  if (!title.includes(site.expectedTitle)) {
    throw new CheckFailedError("Page title does not contain the expected text", site.expectedTitle, title);
  }

  await pace(session, options);
  return title;
}

/**
 * Reads the meta description three ways (bounded XPath wait, XPath, CSS) and
 * requires each to carry the expected content.
 */
export async function checkMetaDescription(session: BrowserSession, options: CheckOptions = {}) {
  const site = options.site ?? LAB_SITE;
  console.log("Checking for correct meta description");

  await open(session, options);
  const lookups = [
    () => session.waitForPresent(site.metaDescription.xpath, META_WAIT_MS),
    () => session.find(site.metaDescription.xpath),
    () => session.find(site.metaDescription.css),
  ];

  const contents: string[] = [];
  for (const lookup of lookups) {
    const meta = await lookup();
    const content = await meta.getAttribute("content");
    if (content !== site.expectedDescription) {
      throw new CheckFailedError("Meta description differs", site.expectedDescription, content);
    }
    contents.push(content);
  }

  await pace(session, options);
  return contents;
}

// Only "not there" and "not clickable" count as no banner; anything else is a real fault
export async function dismissConsent(
  session: BrowserSession,
  control: Locator,
  timeoutMs = CONSENT_WAIT_MS
): Promise<ConsentOutcome> {
  try {
    const button = await session.waitForClickable(control, timeoutMs);
    await button.click();
  } catch (e) {
    if (isLookupMiss(e)) return "not-present-or-not-clickable";
    throw e;
  }
  return "dismissed";
}

export async function checkNavigation(session: BrowserSession, options: CheckOptions = {}) {
  const site = options.site ?? LAB_SITE;
  console.log("Checking navigation to the news page");

  await open(session, options);
  const consent = await dismissConsent(session, site.consentReject);
  console.log(consent === "dismissed" ? "Cookie banner dismissed" : "No cookie banner found, continuing...");
  await pace(session, options);

  const link = await session.find(site.newsLink);
  await link.click();
  await session.waitForUrlContains(site.newsPath, NAVIGATION_WAIT_MS);

  // Only holds for a real URL transition, not for content swapped in place
  const url = await session.currentUrl();
  if (!url.includes(site.newsPath)) {
    throw new CheckFailedError("Did not arrive on the news page", site.newsPath, url);
  }

  await pace(session, options);
  return { consent, url };
}

export async function captureFrontPage(session: BrowserSession, options: CheckOptions = {}) {
  console.log("Checking that the front page looks OK");

  await open(session, options);
  const now = options.now ?? Date.now;
  const file = screenshotPath(SCREENSHOT_PREFIX, options.outputDir ?? OUTPUT_DIR, now());
  await session.screenshot(file);
  console.log("📸 Saved", file);

  await pace(session, options);
  return file;
}

export const CHECKS: readonly Check[] = [
  { name: "title", description: "Page title", run: checkTitle },
  { name: "meta-description", description: "Meta description", run: checkMetaDescription },
  { name: "navigation", description: "Navigation to news and stories", run: checkNavigation },
  { name: "front-page", description: "Front page screenshot", run: captureFrontPage },
];
