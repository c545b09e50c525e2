/**
 * Process-level unhandled rejection handler for the CLI.
 *
 * A notifier run is short-lived, so anything that is not an abort or a
 * transient network hiccup ends the run with exit code 1.
 */

import { getChildLogger } from "../logging.js";
import { formatErrorSafe, isAbortError, isTransientNetworkError } from "./network-errors.js";

export type RejectionCategory = "fatal" | "config" | "transient" | "abort" | "unknown";

export function categorize(err: unknown): RejectionCategory {
	if (isAbortError(err)) return "abort";
	if (isTransientNetworkError(err)) return "transient";

	const message = formatErrorSafe(err, 1000);
	const lower = message.toLowerCase();

	if (
		lower.includes("invalid configuration") ||
		lower.includes("is required") ||
		lower.includes("enoent") ||
		lower.includes("cannot find module")
	) {
		return "config";
	}

	if (
		lower.includes("out of memory") ||
		lower.includes("assertion") ||
		lower.includes("maximum call stack")
	) {
		return "fatal";
	}

	return "unknown";
}

/**
 * Exit code a rejection of this category leaves behind, or null to keep running.
 */
export function exitCodeFor(category: RejectionCategory): number | null {
	switch (category) {
		case "abort":
		case "transient":
			return null;
		default:
			return 1;
	}
}

/**
 * Install the unhandled rejection handler. Call once at process startup.
 */
export function installUnhandledRejectionHandler(): void {
	const logger = getChildLogger({ module: "unhandled-rejections" });

	process.on("unhandledRejection", (reason: unknown) => {
		const category = categorize(reason);
		const formatted = formatErrorSafe(reason);

		switch (category) {
			case "abort":
				logger.debug(`suppressed abort rejection: ${formatted}`);
				break;
			case "transient":
				logger.warn({ category }, `transient unhandled rejection (continuing): ${formatted}`);
				break;
			case "config":
				logger.fatal({ category }, `config error: ${formatted}`);
				break;
			case "fatal":
				logger.fatal({ category }, `fatal unhandled rejection: ${formatted}`);
				break;
			default:
				logger.error({ category }, `unhandled rejection: ${formatted}`);
				break;
		}

		const code = exitCodeFor(category);
		if (code !== null) {
			process.exitCode = code;
		}
	});
}
