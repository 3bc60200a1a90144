/**
 * Drain waiters used at shutdown.
 *
 * waitForDrain polls from async code and never gives up.
 * waitForDrainSync blocks the thread in short Atomics.wait slices up to a
 * ceiling; it is for process 'exit' handlers, where nothing asynchronous can
 * run any more, so it only sees state that is already settled.
 */

export const DEFAULT_FLUSH_POLL_INTERVAL_MS = 100;
export const DEFAULT_FORCED_FLUSH_TIMEOUT_MS = 5_000;
const SYNC_SLICE_MS = 10;

export type DrainCheck = () => boolean;

export async function waitForDrain(
	isDrained: DrainCheck,
	pollIntervalMs = DEFAULT_FLUSH_POLL_INTERVAL_MS,
): Promise<void> {
	while (!isDrained()) {
		await new Promise((resolve) => setTimeout(resolve, pollIntervalMs));
	}
}

/**
 * Returns true once drained, false when the ceiling elapsed first.
 */
export function waitForDrainSync(
	isDrained: DrainCheck,
	timeoutMs = DEFAULT_FORCED_FLUSH_TIMEOUT_MS,
): boolean {
	const cell = new Int32Array(new SharedArrayBuffer(4));
	// NaN would never pass the deadline and Atomics.wait reads it as forever
	const deadline = Date.now() + (Number.isFinite(timeoutMs) ? Math.max(0, timeoutMs) : 0);

	while (!isDrained()) {
		const remaining = deadline - Date.now();
		if (remaining <= 0) return false;
		Atomics.wait(cell, 0, 0, Math.min(SYNC_SLICE_MS, remaining));
	}
	return true;
}
