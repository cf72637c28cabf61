// Main exports for programmatic usage

export { runCommand } from "./commands/run";
export { testCommand } from "./commands/test";
export { waitCommand } from "./commands/wait";
export * from "./lib/config";
export * from "./lib/errors";
export * from "./lib/probe";
export * from "./lib/runner";
export * from "./lib/wait";
export * from "./types/executor";
export { createProgram } from "./program";
