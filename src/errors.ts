/**
 * Errors shared across the report, config and CLI layers.
 *
 * Transport and formatting errors live next to the code that raises them
 * (telegram/transport.ts, telegram/split.ts).
 */

/**
 * Malformed input: a drift report or a configuration value that fails validation.
 * Never retried.
 */
export class ValidationError extends Error {
	constructor(
		message: string,
		public readonly issues: readonly string[] = [],
	) {
		super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
		this.name = "ValidationError";
	}
}

export class ReportNotFoundError extends Error {
	constructor(public readonly reportPath: string) {
		super(`Drift report not found: ${reportPath}`);
		this.name = "ReportNotFoundError";
	}
}
