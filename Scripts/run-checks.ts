// Usage: npm run checks -- [title] [meta-description] [navigation] [front-page]
import "dotenv/config";
import { launchSession } from "./session";
import { runChecks, selectChecks } from "./runner";

(async () => {
  const results = await runChecks(launchSession, selectChecks(process.argv.slice(2)));
  const failed = results.filter((r) => !r.passed);
  console.log(`${results.length - failed.length}/${results.length} checks passed`);
  process.exitCode = failed.length ? 1 : 0;
})().catch((e) => {
  console.error("Failed:", e);
  process.exitCode = 1;
});
