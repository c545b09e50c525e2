import { isDeepStrictEqual } from "node:util";

export const ACTION_TYPES = ["create", "update", "delete", "replace", "no-op"] as const;

export type ActionType = (typeof ACTION_TYPES)[number];

export type AttributeMap = Record<string, unknown>;

/**
 * One resource whose live state diverged from the planned state.
 */
export type ResourceChange = {
	/** Resource type, e.g. `aws_instance`. */
	kind: string;
	name: string;
	action: ActionType;
	before?: AttributeMap | null;
	after?: AttributeMap | null;
};

export type DriftEvent = {
	timestamp: Date;
	environment: string;
	branch: string;
	runId: string;
	runUrl: string;
	/** Passed through as reported, even when it disagrees with `changes`. */
	driftDetected: boolean;
	changes: ResourceChange[];
};

const NOT_SET = "[not set]";

export function displayName(change: ResourceChange): string {
	return `${change.kind}.${change.name}`;
}

function formatAttributeValue(value: unknown): string {
	if (value === undefined) return NOT_SET;
	// Multi-line strings stay on one line so a block never contains a blank line.
	if (typeof value === "string" && !value.includes("\n")) return value;
	return JSON.stringify(value);
}

/**
 * Attribute-level diff lines (`key: before → after`), sorted by key.
 * Falls back to `Action: <action>` when either side is missing or nothing differs.
 */
export function changeSummary(change: ResourceChange): string[] {
	const fallback = [`Action: ${change.action}`];
	const { before, after } = change;
	if (!before || !after || Object.keys(before).length === 0 || Object.keys(after).length === 0) {
		return fallback;
	}

	const keys = Array.from(new Set([...Object.keys(before), ...Object.keys(after)])).sort();
	const lines: string[] = [];
	for (const key of keys) {
		const beforeValue = before[key];
		const afterValue = after[key];
		if (!isDeepStrictEqual(beforeValue, afterValue)) {
			lines.push(
				`${key}: ${formatAttributeValue(beforeValue)} → ${formatAttributeValue(afterValue)}`,
			);
		}
	}
	return lines.length > 0 ? lines : fallback;
}

export function totalChanges(event: DriftEvent): number {
	return event.changes.length;
}

/**
 * Count of changes per action. Only actions that occur are present.
 */
export function changesByAction(event: DriftEvent): Partial<Record<ActionType, number>> {
	const counts: Partial<Record<ActionType, number>> = {};
	for (const change of event.changes) {
		counts[change.action] = (counts[change.action] ?? 0) + 1;
	}
	return counts;
}

/**
 * Replace the event's environment. Nothing else, `driftDetected` included, is touched.
 */
export function applyEnvironmentOverride(event: DriftEvent, environment?: string): DriftEvent {
	if (!environment) return event;
	return { ...event, environment };
}
