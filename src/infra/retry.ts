import type { TransportErrorKind } from "../telegram/transport.js";
import { sleep } from "../utils.js";

/**
 * Exponential backoff: `min(initialDelayMs * multiplier^attempt, maxDelayMs)`.
 */
export type BackoffPolicy = {
	/** Delay before the first retry, in milliseconds. */
	initialDelayMs: number;
	/** Exponential backoff factor. */
	multiplier: number;
	/** Upper bound for any single delay, in milliseconds. */
	maxDelayMs: number;
};

export type RetryConfig = BackoffPolicy & {
	/** Maximum number of attempts (including the first). Must be >= 1. */
	maxAttempts: number;
};

export type RetryOptions = Partial<RetryConfig> & {
	/** Predicate: return true if the error is retryable. Defaults to always-retry. */
	shouldRetry?: (err: unknown, info: RetryInfo) => boolean;
	/** Called before each retry sleep. Useful for logging and bookkeeping. */
	onRetry?: (err: unknown, info: RetryInfo) => void;
	/**
	 * Server-requested delay (ms) for this error. It is waited in full, even above
	 * `maxDelayMs`: an earlier retry would only be refused again.
	 */
	retryAfterMs?: (err: unknown) => number | undefined;
	/** Aborts pending waits; no further attempt starts once aborted. */
	signal?: AbortSignal;
	/** Optional label for logging / error messages. */
	label?: string;
};

export type RetryInfo = {
	/** 1-based attempt number that just failed. */
	attempt: number;
	/** Total attempts allowed. */
	maxAttempts: number;
	/** Delay before the next attempt (ms). */
	delayMs: number;
};

export const DEFAULT_BACKOFF_POLICY: BackoffPolicy = {
	initialDelayMs: 2_000,
	multiplier: 2,
	maxDelayMs: 8_000,
};

/**
 * Only transport-level transient failures are retried. Every other kind is
 * fatal whatever budget remains.
 */
const RETRYABLE_KINDS: ReadonlySet<TransportErrorKind> = new Set<TransportErrorKind>([
	"network",
	"timeout",
	"rate_limited",
]);

export function isRetryableKind(kind: TransportErrorKind): boolean {
	return RETRYABLE_KINDS.has(kind);
}

const DEFAULT_CONFIG: RetryConfig = {
	...DEFAULT_BACKOFF_POLICY,
	maxAttempts: 3,
};

export function resolveRetryConfig(opts?: Partial<RetryConfig>): RetryConfig {
	return {
		maxAttempts: Math.max(1, opts?.maxAttempts ?? DEFAULT_CONFIG.maxAttempts),
		initialDelayMs: Math.max(0, opts?.initialDelayMs ?? DEFAULT_CONFIG.initialDelayMs),
		maxDelayMs: Math.max(0, opts?.maxDelayMs ?? DEFAULT_CONFIG.maxDelayMs),
		multiplier: Math.max(1, opts?.multiplier ?? DEFAULT_CONFIG.multiplier),
	};
}

/**
 * Backoff delay for a zero-based attempt index. With the defaults: 2000, 4000, 8000, 8000, ...
 */
export function computeBackoffDelay(policy: BackoffPolicy, attempt: number): number {
	const base = policy.initialDelayMs * policy.multiplier ** Math.max(0, attempt);
	return Math.min(base, policy.maxDelayMs);
}

/**
 * Retry an async operation with exponential backoff.
 *
 * @example
 * ```ts
 * const id = await retryAsync(() => transport.sendMessage(channel, text, true), {
 *   maxAttempts: 3,
 *   shouldRetry: (err) => err instanceof TransportError && err.retryable,
 *   onRetry: (err, info) => logger.warn({ attempt: info.attempt }, "retrying"),
 * });
 * ```
 */
export async function retryAsync<T>(fn: () => Promise<T>, opts?: RetryOptions): Promise<T> {
	const config = resolveRetryConfig(opts);
	const { shouldRetry, onRetry, retryAfterMs, signal, label } = opts ?? {};

	let lastError: unknown;

	for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
		if (signal?.aborted) {
			throw signal.reason ?? new Error(`${label ?? "retryAsync"}: aborted`);
		}
		try {
			return await fn();
		} catch (err) {
			lastError = err;

			if (attempt >= config.maxAttempts) {
				break;
			}

			const info: RetryInfo = {
				attempt,
				maxAttempts: config.maxAttempts,
				delayMs: 0, // filled below
			};

			if (shouldRetry && !shouldRetry(err, info)) {
				break;
			}

			const serverDelay = retryAfterMs?.(err);
			const delay =
				serverDelay !== undefined && serverDelay > 0
					? serverDelay
					: computeBackoffDelay(config, attempt - 1);
			info.delayMs = delay;

			onRetry?.(err, info);

			if (delay > 0) {
				await sleep(delay, signal);
			}
		}
	}

	const prefix = label ? `${label}: ` : "";
	throw lastError ?? new Error(`${prefix}retryAsync exhausted ${config.maxAttempts} attempts`);
}
