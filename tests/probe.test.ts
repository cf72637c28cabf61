import { createServer, type Server } from "net";
import { afterEach, describe, expect, it } from "vitest";
import { tcpProbe } from "../src/lib/probe";

function listen(server: Server): Promise<number> {
	return new Promise((resolve, reject) => {
		server.once("error", reject);
		server.listen(0, "127.0.0.1", () => {
			const address = server.address();
			if (address && typeof address === "object") {
				resolve(address.port);
			} else {
				reject(new Error("server has no port"));
			}
		});
	});
}

function close(server: Server): Promise<void> {
	return new Promise((resolve) => {
		if (!server.listening) {
			resolve();
			return;
		}
		server.close(() => resolve());
	});
}

describe("tcpProbe", () => {
	let server: Server | undefined;

	afterEach(async () => {
		if (server) {
			await close(server);
			server = undefined;
		}
	});

	it("reports ok when the port accepts a connection", async () => {
		server = createServer((socket) => socket.destroy());
		const port = await listen(server);

		await expect(tcpProbe("127.0.0.1", port, 1000)).resolves.toEqual({ ok: true });
	});

	it("reports failure with a reason when nothing is listening", async () => {
		const closed = createServer();
		const port = await listen(closed);
		await close(closed);

		const result = await tcpProbe("127.0.0.1", port, 1000);

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.reason).toContain("ECONNREFUSED");
		}
	});
});
