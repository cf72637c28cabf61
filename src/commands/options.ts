import type { Executor } from "../types/executor";
import {
  applyOverrides,
  getConfig,
  type ConfigLayer,
  type TenantCiConfig,
} from "../lib/config";

export interface DatabaseFlags {
  host?: string;
  port?: number;
  maxAttempts?: number;
  interval?: number;
  connectTimeout?: number;
}

export interface TestFlags {
  keepdb?: boolean;
  executor?: Executor[];
  projectDir?: string;
  python?: string;
  target?: string;
}

export function toOverrides(flags: DatabaseFlags & TestFlags): ConfigLayer {
  return {
    database: {
      host: flags.host,
      port: flags.port,
      maxAttempts: flags.maxAttempts,
      intervalMs: flags.interval,
      connectTimeoutMs: flags.connectTimeout,
    },
    tests: {
      // --keepdb can only switch reuse on; its absence defers to config and KEEPDB
      keepDb: flags.keepdb ? true : undefined,
      executors: flags.executor,
      projectDir: flags.projectDir,
      python: flags.python,
      target: flags.target,
    },
  };
}

export async function resolveConfig(
  flags: DatabaseFlags & TestFlags,
): Promise<TenantCiConfig> {
  const config = await getConfig();
  return applyOverrides(config, toOverrides(flags));
}
