import { vi } from "vitest";
import type { Logger } from "../src/utils/ui";

export function createLog() {
	return {
		info: vi.fn<Logger["info"]>(),
		step: vi.fn<Logger["step"]>(),
		success: vi.fn<Logger["success"]>(),
		warn: vi.fn<Logger["warn"]>(),
	} satisfies Logger;
}
