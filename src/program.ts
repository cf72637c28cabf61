import { Command, InvalidArgumentError } from "commander";
import { runCommand } from "./commands/run";
import { testCommand } from "./commands/test";
import { waitCommand } from "./commands/wait";
import { EXECUTORS, isExecutor, type Executor } from "./types/executor";
import { setSilentMode } from "./utils/ui";

function parseInteger(value: string): number {
	if (!/^\d+$/.test(value)) {
		throw new InvalidArgumentError("Not a non-negative integer.");
	}
	return Number.parseInt(value, 10);
}

function collectExecutor(value: string, previous: Executor[] | undefined): Executor[] {
	if (!isExecutor(value)) {
		throw new InvalidArgumentError(`Expected one of: ${EXECUTORS.join(", ")}.`);
	}
	return [...(previous ?? []), value];
}

function addDatabaseOptions(command: Command): Command {
	return command
		.option("--host <host>", "Database host (default: $DATABASE_HOST or localhost)")
		.option("--port <port>", "Database port (default: 5432)", parseInteger)
		.option("--max-attempts <n>", "Connection attempts before giving up (default: 50)", parseInteger)
		.option("--interval <ms>", "Delay between attempts in ms (default: 1000)", parseInteger)
		.option("--connect-timeout <ms>", "Timeout for a single attempt in ms (default: 1000)", parseInteger);
}

function addTestOptions(command: Command): Command {
	return command
		.option("-k, --keepdb", "Reuse the existing test database (same as KEEPDB=true)")
		.option(
			"-e, --executor <names...>",
			`Executors to run, in order (default: ${EXECUTORS.join(" ")})`,
			collectExecutor,
		)
		.option("--project-dir <dir>", "Directory holding manage.py (default: dts_test_project)")
		.option("--python <cmd>", "Python interpreter (default: python3)")
		.option("--target <label>", "Test label to run (default: django_tenants.tests)");
}

export function createProgram(): Command {
	const program = new Command();

	program
		.name("tenantci")
		.description("Wait for PostgreSQL, then run the tenant test suite once per executor")
		.version("1.0.0")
		.option("-s, --silent", "Suppress progress output; errors are still printed")
		.hook("preAction", (thisCommand) => {
			const opts = thisCommand.opts();
			if (opts.silent) {
				setSilentMode(true);
			}
		});

	addTestOptions(
		addDatabaseOptions(
			program
				.command("run", { isDefault: true })
				.description("Wait for the database, then run the test suite"),
		),
	).action(async (options) => {
		await runCommand(options);
	});

	addDatabaseOptions(
		program.command("wait").description("Block until the database accepts TCP connections"),
	).action(async (options) => {
		await waitCommand(options);
	});

	addTestOptions(
		program.command("test").description("Run the test suite once per executor"),
	).action(async (options) => {
		await testCommand(options);
	});

	return program;
}
