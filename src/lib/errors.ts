import type { Executor } from "../types/executor";

export interface TenantCiErrorOptions {
	exitCode?: number;
	cause?: unknown;
}

/**
 * Base class for every failure the harness reports on purpose.
 * `exitCode` is what the process exits with when the error reaches the CLI.
 */
export class TenantCiError extends Error {
	readonly code: string;
	readonly exitCode: number;

	constructor(code: string, message: string, options: TenantCiErrorOptions = {}) {
		super(message, options.cause === undefined ? undefined : { cause: options.cause });
		this.name = "TenantCiError";
		this.code = code;
		this.exitCode = options.exitCode ?? 1;
	}
}

export interface ConfigIssue {
	path: string;
	message: string;
}

export class ConfigError extends TenantCiError {
	readonly issues: ConfigIssue[];

	constructor(issues: ConfigIssue[]) {
		const summary = issues
			.map((issue) => `${issue.path || "(root)"}: ${issue.message}`)
			.join("; ");
		super("CONFIG_INVALID", `Invalid configuration: ${summary}`, { exitCode: 2 });
		this.name = "ConfigError";
		this.issues = issues;
	}
}

export class DatabaseUnreachableError extends TenantCiError {
	readonly host: string;
	readonly port: number;
	readonly attempts: number;

	constructor(
		message: string,
		details: { host: string; port: number; attempts: number; reason?: string },
	) {
		super("DATABASE_UNREACHABLE", message, {
			exitCode: 1,
			cause: details.reason === undefined ? undefined : new Error(details.reason),
		});
		this.name = "DatabaseUnreachableError";
		this.host = details.host;
		this.port = details.port;
		this.attempts = details.attempts;
	}
}

export class ProjectDirectoryError extends TenantCiError {
	readonly directory: string;

	constructor(directory: string) {
		super("PROJECT_DIR_MISSING", `Test project directory not found: ${directory}`, {
			exitCode: 1,
		});
		this.name = "ProjectDirectoryError";
		this.directory = directory;
	}
}

export class TestRunFailedError extends TenantCiError {
	readonly executor: Executor;

	constructor(executor: Executor, status: string, exitCode: number, cause?: unknown) {
		super("TEST_RUN_FAILED", `Tests failed with EXECUTOR=${executor} (${status})`, {
			exitCode,
			cause,
		});
		this.name = "TestRunFailedError";
		this.executor = executor;
	}
}

export function exitCodeFor(error: unknown): number {
	if (error instanceof TenantCiError) {
		return error.exitCode;
	}
	return 1;
}
