import { Socket } from "net";

export type ProbeResult = { ok: true } | { ok: false; reason: string };

export type Probe = (
	host: string,
	port: number,
	timeoutMs: number,
) => Promise<ProbeResult>;

/**
 * Liveness check: succeeds as soon as the TCP connect completes.
 * No bytes are exchanged with the server.
 */
export const tcpProbe: Probe = (host, port, timeoutMs) =>
	new Promise((resolve) => {
		const socket = new Socket();
		let settled = false;

		const finish = (result: ProbeResult) => {
			if (settled) return;
			settled = true;
			socket.destroy();
			resolve(result);
		};

		socket.setTimeout(timeoutMs);
		socket.once("connect", () => finish({ ok: true }));
		socket.once("timeout", () =>
			finish({ ok: false, reason: `connect timed out after ${timeoutMs}ms` }),
		);
		socket.once("error", (error) => finish({ ok: false, reason: error.message }));
		socket.connect(port, host);
	});
