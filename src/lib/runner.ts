import { existsSync, statSync } from "fs";
import { resolve } from "path";
import color from "picocolors";
import type { Executor } from "../types/executor";
import { ProjectDirectoryError, TestRunFailedError } from "./errors";
import {
	formatExitStatus,
	isCommandNotFound,
	spawnCommand,
	toShellExitCode,
	type CommandRunner,
} from "../utils/process";
import { logger, type Logger } from "../utils/ui";

// Shell convention for "command not found"
const COMMAND_NOT_FOUND_EXIT_CODE = 127;

export interface TestSuiteOptions {
	python: string;
	manageScript: string;
	target: string;
	projectDir: string;
	executors: readonly Executor[];
	keepDb: boolean;
	cwd?: string;
	env?: NodeJS.ProcessEnv;
	run?: CommandRunner;
	log?: Logger;
}

export interface TestRun {
	executor: Executor;
	args: string[];
}

export function buildTestArgs(
	manageScript: string,
	target: string,
	keepDb: boolean,
): string[] {
	const args = [manageScript, "test"];
	if (keepDb) {
		args.push("-k");
	}
	args.push(target);
	return args;
}

/**
 * Run the test target once per executor, in order.
 * The first failing run throws and the remaining executors are skipped.
 */
export async function runTestSuite(options: TestSuiteOptions): Promise<TestRun[]> {
	const {
		python,
		manageScript,
		target,
		projectDir,
		executors,
		keepDb,
		cwd = process.cwd(),
		env = process.env,
		run = spawnCommand,
		log = logger,
	} = options;

	const directory = resolve(cwd, projectDir);
	if (!existsSync(directory) || !statSync(directory).isDirectory()) {
		throw new ProjectDirectoryError(directory);
	}

	const args = buildTestArgs(manageScript, target, keepDb);
	const completed: TestRun[] = [];

	for (const executor of executors) {
		log.step(
			`EXECUTOR=${color.cyan(executor)} ${python} ${args.join(" ")}`,
		);

		const status = await run(python, args, {
			cwd: directory,
			env: { ...env, EXECUTOR: executor },
		}).catch((error: unknown) => {
			if (isCommandNotFound(error)) {
				throw new TestRunFailedError(
					executor,
					`${python}: command not found`,
					COMMAND_NOT_FOUND_EXIT_CODE,
					error,
				);
			}
			throw error;
		});

		if (status.exitCode !== 0) {
			throw new TestRunFailedError(
				executor,
				formatExitStatus(status),
				toShellExitCode(status),
			);
		}

		log.success(`Tests passed with EXECUTOR=${executor}`);
		completed.push({ executor, args: [...args] });
	}

	return completed;
}
