import fs from "node:fs";

import { z } from "zod";

import { ReportNotFoundError, ValidationError } from "../errors.js";
import { ACTION_TYPES, type DriftEvent } from "./types.js";

// ISO-8601 without a zone designator is taken as UTC.
const ZONE_SUFFIX = /(Z|[+-]\d{2}:?\d{2})$/i;

function parseTimestamp(value: string): Date | null {
	const trimmed = value.trim();
	const normalized = /T|\s/.test(trimmed) && !ZONE_SUFFIX.test(trimmed) ? `${trimmed}Z` : trimmed;
	const date = new Date(normalized.replace(" ", "T"));
	return Number.isNaN(date.getTime()) ? null : date;
}

const AttributesSchema = z.record(z.string(), z.unknown()).nullable().optional();

const ResourceChangeSchema = z.object({
	resource_type: z.string().default("unknown"),
	resource_name: z.string().default("unknown"),
	action: z.enum(ACTION_TYPES).default("update"),
	before: AttributesSchema,
	after: AttributesSchema,
});

const DriftReportSchema = z.object({
	timestamp: z.string().optional(),
	environment: z.string().default("unknown"),
	branch: z.string().default("unknown"),
	workflow_run_id: z.union([z.string(), z.number()]).transform(String).default("unknown"),
	workflow_run_url: z.string().default(""),
	drift_detected: z.boolean().optional(),
	resource_changes: z.array(ResourceChangeSchema).default([]),
});

export type DriftReport = z.input<typeof DriftReportSchema>;

/**
 * Convert a decoded drift report into a DriftEvent.
 *
 * Missing optional fields fall back to `"unknown"` or empty; a missing
 * `drift_detected` is derived from whether any changes were reported.
 * An unknown action fails validation.
 */
export function parseDriftReport(data: unknown, now: () => Date = () => new Date()): DriftEvent {
	const result = DriftReportSchema.safeParse(data);
	if (!result.success) {
		throw new ValidationError(
			"Invalid drift report",
			result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
		);
	}
	const report = result.data;

	let timestamp = now();
	if (report.timestamp !== undefined) {
		const parsed = parseTimestamp(report.timestamp);
		if (!parsed) {
			throw new ValidationError("Invalid drift report", [
				`timestamp: not an ISO-8601 date: ${report.timestamp}`,
			]);
		}
		timestamp = parsed;
	}

	const changes = report.resource_changes.map((change) => ({
		kind: change.resource_type,
		name: change.resource_name,
		action: change.action,
		before: change.before,
		after: change.after,
	}));

	return {
		timestamp,
		environment: report.environment,
		branch: report.branch,
		runId: report.workflow_run_id,
		runUrl: report.workflow_run_url,
		driftDetected: report.drift_detected ?? changes.length > 0,
		changes,
	};
}

/**
 * Read and parse a drift report JSON file.
 */
export function readDriftReport(reportPath: string): DriftEvent {
	let raw: string;
	try {
		raw = fs.readFileSync(reportPath, "utf-8");
	} catch (err) {
		if (err instanceof Error && "code" in err && err.code === "ENOENT") {
			throw new ReportNotFoundError(reportPath);
		}
		throw err;
	}

	let data: unknown;
	try {
		data = JSON.parse(raw);
	} catch (err) {
		throw new ValidationError(`Drift report ${reportPath} is not valid JSON`, [
			err instanceof Error ? err.message : String(err),
		]);
	}

	return parseDriftReport(data);
}
