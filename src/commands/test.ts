import color from "picocolors";
import { runTestSuite } from "../lib/runner";
import { exitWithError, intro, outro } from "../utils/ui";
import { resolveConfig, type TestFlags } from "./options";

export async function testCommand(options: TestFlags): Promise<void> {
  intro(color.bgCyan(color.black(" tenantci test ")));

  try {
    const config = await resolveConfig(options);
    const runs = await runTestSuite(config.tests);
    outro(color.green(`Done! ${runs.length} test run(s) passed`));
  } catch (error) {
    exitWithError(error);
  }
}
