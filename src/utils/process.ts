import { spawn } from "child_process";
import { constants } from "os";

export interface CommandStatus {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

export interface RunCommandOptions {
  cwd: string;
  env: NodeJS.ProcessEnv;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options: RunCommandOptions,
) => Promise<CommandStatus>;

/**
 * Run a command attached to this terminal and report how it ended.
 * Rejects only when the process could not be started.
 */
export const spawnCommand: CommandRunner = (command, args, { cwd, env }) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, { cwd, env, stdio: "inherit" });

    child.on("error", reject);
    child.on("close", (exitCode, signal) => {
      resolve({ exitCode, signal });
    });
  });

export function formatExitStatus(status: CommandStatus): string {
  if (status.exitCode !== null) {
    return `exit code ${status.exitCode}`;
  }
  if (status.signal) {
    return `signal ${status.signal}`;
  }
  return "unknown exit status";
}

/**
 * Exit code a shell would report for this status: the child's own code,
 * or 128 plus the signal number when it was killed by a signal.
 */
export function toShellExitCode(status: CommandStatus): number {
  if (status.exitCode !== null) {
    return status.exitCode;
  }
  if (status.signal) {
    const signal = status.signal;
    const number = Object.entries(constants.signals).find(([name]) => name === signal)?.[1];
    if (number !== undefined) {
      return 128 + number;
    }
  }
  return 1;
}

export function isCommandNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
