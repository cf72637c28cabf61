import color from "picocolors";
import { runTestSuite } from "../lib/runner";
import { waitForDatabase } from "../lib/wait";
import { exitWithError, intro, outro } from "../utils/ui";
import { resolveConfig, type DatabaseFlags, type TestFlags } from "./options";

export type RunOptions = DatabaseFlags & TestFlags;

/**
 * Wait for the database, then drive the test suite. Nothing runs
 * if the database never comes up.
 */
export async function runCommand(options: RunOptions): Promise<void> {
  intro(color.bgCyan(color.black(" tenantci ")));

  try {
    const config = await resolveConfig(options);
    await waitForDatabase(config.database);
    const runs = await runTestSuite(config.tests);
    outro(color.green(`Done! ${runs.length} test run(s) passed`));
  } catch (error) {
    exitWithError(error);
  }
}
