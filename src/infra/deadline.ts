/**
 * A deadline fired before the work it bounds finished. Carries the name
 * "TimeoutError" so the network-error helpers classify it as a timeout.
 */
export class TimeoutError extends Error {
	constructor(
		public readonly label: string,
		public readonly deadlineMs: number,
	) {
		super(`${label} timed out after ${deadlineMs}ms`);
		this.name = "TimeoutError";
	}
}

/**
 * Run `run` under a deadline. When the deadline fires, the signal handed to
 * `run` is aborted with a TimeoutError and the returned promise rejects with
 * that same error, whatever `run` does afterwards.
 *
 * A non-positive or non-finite `deadlineMs` runs without a deadline.
 */
export async function withDeadline<T>(
	run: (signal: AbortSignal) => Promise<T>,
	deadlineMs: number,
	label: string,
): Promise<T> {
	const controller = new AbortController();
	if (deadlineMs <= 0 || !Number.isFinite(deadlineMs)) {
		return run(controller.signal);
	}

	let expired: TimeoutError | undefined;
	let timer: NodeJS.Timeout | undefined;
	const deadline = new Promise<never>((_, reject) => {
		timer = setTimeout(() => {
			expired = new TimeoutError(label, deadlineMs);
			controller.abort(expired);
			reject(expired);
		}, deadlineMs);
		timer.unref();
	});

	try {
		return await Promise.race([run(controller.signal), deadline]);
	} catch (err) {
		// Work that rejects because it saw the abort still reports the deadline.
		throw expired ?? err;
	} finally {
		clearTimeout(timer);
	}
}
