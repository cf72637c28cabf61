import { DatabaseUnreachableError } from "./errors";
import { tcpProbe, type Probe } from "./probe";
import { logger, type Logger } from "../utils/ui";

export interface WaitForDatabaseOptions {
	host: string;
	port: number;
	maxAttempts: number;
	intervalMs: number;
	connectTimeoutMs: number;
	probe?: Probe;
	sleep?: (ms: number) => Promise<void>;
	now?: () => Date;
	log?: Logger;
}

export interface WaitResult {
	host: string;
	port: number;
	attempts: number;
}

function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Block until host:port accepts a TCP connection.
 * Gives up once `maxAttempts` probes have failed, so the last failed probe
 * is never followed by a sleep.
 */
export async function waitForDatabase(
	options: WaitForDatabaseOptions,
): Promise<WaitResult> {
	const {
		host,
		port,
		maxAttempts,
		intervalMs,
		connectTimeoutMs,
		probe = tcpProbe,
		sleep: pause = sleep,
		now = () => new Date(),
		log = logger,
	} = options;
	const endpoint = `${host}:${port}`;

	log.info(`Database: ${host}`);

	let failures = 0;
	for (;;) {
		const result = await probe(host, port, connectTimeoutMs);
		if (result.ok) {
			log.success("postgres connection established");
			return { host, port, attempts: failures + 1 };
		}

		failures += 1;
		if (failures >= maxAttempts) {
			throw new DatabaseUnreachableError(
				`${now().toISOString()} - ${endpoint} still not reachable, giving up`,
				{ host, port, attempts: failures, reason: result.reason },
			);
		}

		log.step(`${now().toISOString()} - waiting for ${endpoint}...`);
		await pause(intervalMs);
	}
}
