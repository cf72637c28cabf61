import { describe, expect, it, vi } from "vitest";
import { DatabaseUnreachableError } from "../src/lib/errors";
import type { Probe, ProbeResult } from "../src/lib/probe";
import { waitForDatabase } from "../src/lib/wait";
import { createLog } from "./helpers";

const NOW = new Date("2026-01-01T00:00:00.000Z");

function probeSequence(...results: boolean[]) {
	let call = 0;
	return vi.fn<Probe>(async (): Promise<ProbeResult> => {
		const ok = results[call] ?? false;
		call += 1;
		return ok ? { ok: true } : { ok: false, reason: "connect ECONNREFUSED" };
	});
}

function setup(probe: Probe, maxAttempts = 50) {
	const sleep = vi.fn(async (_ms: number) => {});
	const log = createLog();
	const run = () =>
		waitForDatabase({
			host: "db",
			port: 5432,
			maxAttempts,
			intervalMs: 1000,
			connectTimeoutMs: 250,
			probe,
			sleep,
			now: () => NOW,
			log,
		});
	return { sleep, log, run };
}

describe("waitForDatabase", () => {
	it("gives up after exactly maxAttempts failed probes", async () => {
		const probe = probeSequence();
		const { sleep, log, run } = setup(probe);

		const error = await run().catch((e: unknown) => e);

		if (!(error instanceof DatabaseUnreachableError)) {
			throw new Error("expected DatabaseUnreachableError");
		}
		expect(error.message).toBe(
			"2026-01-01T00:00:00.000Z - db:5432 still not reachable, giving up",
		);
		expect(error.exitCode).toBe(1);
		expect(error.attempts).toBe(50);
		expect(probe).toHaveBeenCalledTimes(50);
		expect(sleep).toHaveBeenCalledTimes(49);
		expect(sleep).toHaveBeenCalledWith(1000);
		expect(log.step).toHaveBeenCalledTimes(49);
		expect(log.step).toHaveBeenNthCalledWith(
			1,
			"2026-01-01T00:00:00.000Z - waiting for db:5432...",
		);
		expect(log.success).not.toHaveBeenCalled();
	});

	it("proceeds as soon as a probe succeeds", async () => {
		const probe = probeSequence(false, false, true);
		const { sleep, log, run } = setup(probe);

		await expect(run()).resolves.toEqual({ host: "db", port: 5432, attempts: 3 });
		expect(probe).toHaveBeenCalledTimes(3);
		expect(sleep).toHaveBeenCalledTimes(2);
		expect(log.info).toHaveBeenCalledWith("Database: db");
		expect(log.success).toHaveBeenCalledWith("postgres connection established");
	});

	it("does not sleep when the first probe succeeds", async () => {
		const probe = probeSequence(true);
		const { sleep, run } = setup(probe);

		await expect(run()).resolves.toEqual({ host: "db", port: 5432, attempts: 1 });
		expect(sleep).not.toHaveBeenCalled();
	});

	it("accepts success on the last allowed attempt", async () => {
		const probe = probeSequence(false, false, true);
		const { sleep, run } = setup(probe, 3);

		await expect(run()).resolves.toEqual({ host: "db", port: 5432, attempts: 3 });
		expect(sleep).toHaveBeenCalledTimes(2);
	});

	it("passes host, port and connect timeout to the probe", async () => {
		const probe = probeSequence(true);
		const { run } = setup(probe);

		await run();

		expect(probe).toHaveBeenCalledWith("db", 5432, 250);
	});

	it("never sleeps with a single allowed attempt", async () => {
		const probe = probeSequence();
		const { sleep, run } = setup(probe, 1);

		await expect(run()).rejects.toBeInstanceOf(DatabaseUnreachableError);
		expect(probe).toHaveBeenCalledTimes(1);
		expect(sleep).not.toHaveBeenCalled();
	});
});
