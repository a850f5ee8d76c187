import { byId, css, xpath, type Locator } from "./session";

export type Site = {
  url: string;
  expectedTitle: string;
  expectedDescription: string;
  metaDescription: { xpath: Locator; css: Locator };
  // There is no standard id for a consent "reject" button; this one comes from the page source
  consentReject: Locator;
  newsLink: Locator;
  newsPath: string;
};

export const LAB_SITE: Site = {
  url: "https://lab.fi/en",
  expectedTitle: "LAB University of Applied Sciences | LAB.fi",
  expectedDescription:
    "LAB is a higher education institution focusing on innovation, business and industry. It operates in Lahti and Lappeenranta and also provides education online.",
  metaDescription: {
    xpath: xpath("//head/meta[@name='description']"),
    css: css("head > meta[name='description']"),
  },
  consentReject: byId("ppms_cm_reject-all"),
  // Drupal node of the "News and Stories" page
  newsLink: css('a[data-drupal-link-system-path="node/5"]'),
  newsPath: "/news-and-stories",
};

export const META_WAIT_MS = 5_000;
export const CONSENT_WAIT_MS = 5_000;
export const NAVIGATION_WAIT_MS = 10_000;

export const SCREENSHOT_PREFIX = "screenshot";
