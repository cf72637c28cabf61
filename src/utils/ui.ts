import * as p from "@clack/prompts";
import { exitCodeFor } from "../lib/errors";

let silentMode = false;

export function setSilentMode(silent: boolean) {
	silentMode = silent;
}

export function isSilentMode() {
	return silentMode;
}

export interface Logger {
	info(message: string): void;
	step(message: string): void;
	success(message: string): void;
	warn(message: string): void;
}

export const logger: Logger = {
	info: (message) => {
		if (!silentMode) p.log.info(message);
	},
	step: (message) => {
		if (!silentMode) p.log.step(message);
	},
	success: (message) => {
		if (!silentMode) p.log.success(message);
	},
	warn: (message) => {
		if (!silentMode) p.log.warn(message);
	},
};

export function intro(title: string) {
	if (!silentMode) p.intro(title);
}

export function outro(message: string) {
	if (!silentMode) p.outro(message);
}

/**
 * Report a fatal error and terminate with the exit code it maps to.
 * Errors are printed even in silent mode.
 */
export function exitWithError(error: unknown): never {
	p.cancel(error instanceof Error ? error.message : String(error));
	process.exit(exitCodeFor(error));
}
