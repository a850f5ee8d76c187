import { defineConfig } from "@playwright/test";

export default defineConfig({
  timeout: 30_000,
  // one check, one browser, one at a time
  workers: 1,
  fullyParallel: false,
  projects: [
    // fake in-process session, no browser or network
    { name: "unit", testDir: "./tests/unit" },
    // real Chromium on routed local pages, no network
    { name: "browser", testDir: "./tests/browser", use: { browserName: "chromium" } },
    // real Chromium against https://lab.fi/en
    { name: "live", testDir: "./tests/live", timeout: 60_000 },
  ],
});
