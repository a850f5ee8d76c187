import { CHECKS, type Check, type CheckOptions } from "./checks";
import { withSession, type SessionLauncher } from "./session";

export type CheckResult = {
  name: string;
  passed: boolean;
  detail: string;
};

export function selectChecks(names: string[]): Check[] {
  if (!names.length) return [...CHECKS];
  return names.map((name) => {
    const check = CHECKS.find((c) => c.name === name);
    if (!check) {
      throw new Error(`Unknown check "${name}". Available: ${CHECKS.map((c) => c.name).join(", ")}`);
    }
    return check;
  });
}

// One at a time, each in its own browser; a failure does not stop the rest
export async function runChecks(
  launch: SessionLauncher,
  checks: readonly Check[] = CHECKS,
  options: CheckOptions = {}
): Promise<CheckResult[]> {
  const results: CheckResult[] = [];
  for (const check of checks) {
    console.log(`▶ ${check.description}`);
    try {
      await withSession(launch, (session) => check.run(session, options));
      console.log(`✅ ${check.name}`);
      results.push({ name: check.name, passed: true, detail: "ok" });
    } catch (e) {
      const detail = e instanceof Error ? e.message : String(e);
      console.error(`❌ ${check.name}: ${detail}`);
      results.push({ name: check.name, passed: false, detail });
    }
  }
  return results;
}
