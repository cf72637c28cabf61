/**
 * Executor determines how the external test runner schedules its own work.
 *
 * - "standard": migrations and tests run in a single process
 * - "multiprocessing": the runner fans out across worker processes
 *
 * The harness never interprets the value, it only exports it as EXECUTOR.
 */
export const EXECUTORS = ["standard", "multiprocessing"] as const;

export type Executor = (typeof EXECUTORS)[number];

export function isExecutor(value: string): value is Executor {
	return EXECUTORS.some((executor) => executor === value);
}
