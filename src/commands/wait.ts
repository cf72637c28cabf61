import color from "picocolors";
import { waitForDatabase } from "../lib/wait";
import { exitWithError, intro, outro } from "../utils/ui";
import { resolveConfig, type DatabaseFlags } from "./options";

export async function waitCommand(options: DatabaseFlags): Promise<void> {
  intro(color.bgCyan(color.black(" tenantci wait ")));

  try {
    const config = await resolveConfig(options);
    const result = await waitForDatabase(config.database);
    outro(color.green(`${result.host}:${result.port} is accepting connections`));
  } catch (error) {
    exitWithError(error);
  }
}
