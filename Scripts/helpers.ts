import { chromium, type Browser, type Page } from "playwright";
import * as fs from "fs";
import * as path from "path";

// Env helpers
const HEADLESS = process.env.HEADLESS === "false" ? false : true;
const SLOWMO = Number(process.env.SLOWMO || 0);
const SCALE_FACTOR = Number(process.env.SCALE_FACTOR || 0.5);
const WINDOW_SIZE = process.env.WINDOW_SIZE || "1920,1080";
export const PAUSE_MS = Number(process.env.PAUSE_MS || 0);
export const OUTPUT_DIR = process.env.OUTPUT_DIR || ".";

export function launchArgs(headless = HEADLESS) {
  return [
    // 0.5 zooms out so the whole page fits the window
    `--force-device-scale-factor=${SCALE_FACTOR}`,
    // headless has no screen to maximize to
    headless ? `--window-size=${WINDOW_SIZE}` : "--start-maximized",
  ];
}

export async function launchBrowser(): Promise<Browser> {
  return chromium.launch({ headless: HEADLESS, slowMo: SLOWMO, args: launchArgs() });
}

export function ensureDir(dir = OUTPUT_DIR) {
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
}

export function stamp(name: string, now = Date.now()) {
  return `${name}_${Math.floor(now / 1000)}`;
}

// Two captures within the same second get a counter so neither is overwritten
export function screenshotPath(name: string, dir = OUTPUT_DIR, now = Date.now()) {
  ensureDir(dir);
  const base = stamp(name, now);
  let file = path.join(dir, `${base}.png`);
  for (let n = 1; fs.existsSync(file); n++) {
    file = path.join(dir, `${base}_${n}.png`);
  }
  return file;
}

export async function safeGoto(page: Page, url: string) {
  await page.goto(url, { waitUntil: "domcontentloaded" });
}
