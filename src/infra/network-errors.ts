/**
 * Error classification utilities for network resilience.
 *
 * Provides BFS traversal through error cause chains to detect transient
 * network errors, timeouts and aborts.
 */

/** Error codes that indicate a transient network issue. */
const TRANSIENT_NETWORK_CODES = new Set([
	"ECONNRESET",
	"ECONNREFUSED",
	"ECONNABORTED",
	"ETIMEDOUT",
	"EPIPE",
	"ENETUNREACH",
	"EHOSTUNREACH",
	"EAI_AGAIN",
	"ENOTFOUND",
	"UND_ERR_CONNECT_TIMEOUT",
	"UND_ERR_SOCKET",
	"UND_ERR_HEADERS_TIMEOUT",
	"UND_ERR_BODY_TIMEOUT",
]);

const TIMEOUT_CODES = new Set([
	"ETIMEDOUT",
	"UND_ERR_CONNECT_TIMEOUT",
	"UND_ERR_HEADERS_TIMEOUT",
	"UND_ERR_BODY_TIMEOUT",
]);

/** Error messages (substrings) that indicate a transient network issue. */
const TRANSIENT_MESSAGE_PATTERNS = [
	"fetch failed",
	"network error",
	"socket hang up",
	"other side closed",
	"econnreset",
	"etimedout",
	"econnrefused",
	"client network socket disconnected",
	"write epipe",
	"timed out after",
];

// Bot API tokens look like `<bot id>:<35 chars>`.
const BOT_TOKEN_PATTERN = /\d{5,}:[A-Za-z0-9_-]{20,}/g;

/**
 * Collect all error candidates from a (potentially nested) error.
 * BFS through `.cause`, `.reason`, `.error`, `.errors` to find all relevant error objects.
 */
export function collectErrorCandidates(err: unknown, maxDepth = 5): unknown[] {
	const candidates: unknown[] = [];
	const queue: Array<{ value: unknown; depth: number }> = [{ value: err, depth: 0 }];
	const seen = new WeakSet<object>();

	while (queue.length > 0) {
		const item = queue.shift();
		if (!item) break;
		if (item.depth > maxDepth) continue;

		const val = item.value;
		if (val == null || typeof val !== "object") {
			if (val != null) candidates.push(val);
			continue;
		}

		if (seen.has(val)) continue;
		seen.add(val);
		candidates.push(val);

		const nextDepth = item.depth + 1;
		for (const key of ["cause", "reason", "error"] as const) {
			const nested = readField(val, key);
			if (nested != null) {
				queue.push({ value: nested, depth: nextDepth });
			}
		}
		const errors = readField(val, "errors");
		if (Array.isArray(errors)) {
			for (const e of errors) {
				queue.push({ value: e, depth: nextDepth });
			}
		}
	}

	return candidates;
}

/**
 * Check if an error (or any error in its cause chain) is a transient network error.
 * Also classifies TimeoutError as transient (temporary network/server slowness).
 */
export function isTransientNetworkError(err: unknown): boolean {
	for (const candidate of collectErrorCandidates(err)) {
		const code = readField(candidate, "code");
		if (typeof code === "string" && TRANSIENT_NETWORK_CODES.has(code)) {
			return true;
		}
		if (readField(candidate, "name") === "TimeoutError") {
			return true;
		}

		const message = extractMessage(candidate);
		if (message && matchesTransientPattern(message)) {
			return true;
		}
	}

	return false;
}

/**
 * Check if an error (or its cause chain) is a timeout: our TimeoutError,
 * a socket/undici timeout code, or a "timed out" message.
 */
export function isTimeoutError(err: unknown): boolean {
	for (const candidate of collectErrorCandidates(err)) {
		if (readField(candidate, "name") === "TimeoutError") return true;

		const code = readField(candidate, "code");
		if (typeof code === "string" && TIMEOUT_CODES.has(code)) return true;

		const message = extractMessage(candidate);
		if (message?.toLowerCase().includes("timed out")) return true;
	}
	return false;
}

/**
 * Check if an error is an AbortError (expected during shutdown / cancellation).
 */
export function isAbortError(err: unknown): boolean {
	for (const candidate of collectErrorCandidates(err)) {
		// DOMException AbortError
		if (readField(candidate, "name") === "AbortError") return true;

		// Node.js abort
		if (readField(candidate, "code") === "ABORT_ERR") return true;

		const message = extractMessage(candidate);
		if (message) {
			const lower = message.toLowerCase();
			if (
				lower.includes("this operation was aborted") ||
				lower.includes("the operation was aborted") ||
				lower.includes("signal is aborted")
			) {
				return true;
			}
		}
	}

	return false;
}

/**
 * Safely format an error to a string, avoiding circular references
 * and redacting URLs and bot tokens.
 */
export function formatErrorSafe(err: unknown, maxLength = 500): string {
	if (err == null) return "unknown error";

	try {
		if (err instanceof Error) {
			let msg = `${err.name}: ${err.message}`;
			if (err.cause) {
				msg += ` [cause: ${formatErrorSafe(err.cause, maxLength / 2)}]`;
			}
			return truncate(redactSecrets(msg), maxLength);
		}
		return truncate(redactSecrets(String(err)), maxLength);
	} catch {
		return "error (could not format)";
	}
}

function readField(val: unknown, key: string): unknown {
	if (typeof val !== "object" || val === null || !(key in val)) return undefined;
	return Reflect.get(val, key);
}

function extractMessage(val: unknown): string | null {
	if (typeof val === "string") return val;
	const msg = readField(val, "message");
	return typeof msg === "string" ? msg : null;
}

function matchesTransientPattern(message: string): boolean {
	const lower = message.toLowerCase();
	return TRANSIENT_MESSAGE_PATTERNS.some((pattern) => lower.includes(pattern));
}

function redactSecrets(str: string): string {
	return str.replace(/https?:\/\/[^\s]+/g, "[URL]").replace(BOT_TOKEN_PATTERN, "[TOKEN]");
}

function truncate(str: string, maxLength: number): string {
	if (str.length <= maxLength) return str;
	return `${str.slice(0, maxLength - 3)}...`;
}
