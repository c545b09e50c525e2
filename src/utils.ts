import os from "node:os";
import path from "node:path";

/**
 * Sleep for `ms` milliseconds. Rejects with the signal's reason when aborted.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise((resolve, reject) => {
		if (signal?.aborted) {
			reject(signal.reason ?? new Error("Aborted"));
			return;
		}

		const onAbort = () => {
			clearTimeout(timer);
			reject(signal?.reason ?? new Error("Aborted"));
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);

		signal?.addEventListener("abort", onAbort, { once: true });
	});
}

/**
 * Mask a secret for logging, keeping only the first and last `showChars` characters.
 * Short values are fully redacted.
 */
export function maskSecret(value: string | undefined, showChars = 4): string {
	if (!value || value.length <= showChars * 2 + 3) {
		return "[REDACTED]";
	}
	return `${value.slice(0, showChars)}...${value.slice(-showChars)}`;
}

/**
 * Format a date as `YYYYMMDD_HHMMSS` in UTC.
 */
export function compactUtcStamp(date: Date): string {
	const iso = date.toISOString();
	return `${iso.slice(0, 10).replace(/-/g, "")}_${iso.slice(11, 19).replace(/:/g, "")}`;
}

export const CONFIG_DIR = process.env.DRIFT_NOTIFY_DATA_DIR ?? path.join(os.homedir(), ".drift-notify");
