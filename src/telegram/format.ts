/**
 * Drift event → Telegram message text.
 *
 * Output is deterministic: identical events render byte-identical messages,
 * which keeps fixtures stable and re-renders idempotent.
 */

import type { Logger } from "pino";

import {
	type DriftEvent,
	type ResourceChange,
	changeSummary,
	changesByAction,
	displayName,
	totalChanges,
} from "../drift/types.js";
import { SECTION_SEPARATOR } from "./constants.js";
import { escapeLinkUrl, escapeMarkdownV2 } from "./escape.js";
import { type MessagePart, splitMessage } from "./split.js";

export type FormatOptions = {
	/** Render MarkdownV2. When false, the same layout is produced as plain text. */
	markdown?: boolean;
	/** Append the workflow run link when the event has one. Default: true. */
	includeRunLink?: boolean;
};

const ACTION_SYMBOLS: Record<string, string> = {
	create: "➕",
	update: "📝",
	delete: "❌",
	replace: "🔄",
	"no-op": "✓",
};

const DEFAULT_ACTION_SYMBOL = "•";

type Markup = {
	text: (value: string) => string;
	bold: (value: string) => string;
	link: (label: string, url: string) => string;
};

const MARKDOWN: Markup = {
	text: escapeMarkdownV2,
	bold: (value) => `*${value}*`,
	link: (label, url) => `[${escapeMarkdownV2(label)}](${escapeLinkUrl(url)})`,
};

const PLAIN: Markup = {
	text: (value) => value,
	bold: (value) => value,
	link: (label, url) => `${label}: ${url}`,
};

function markupFor(options: FormatOptions): Markup {
	return options.markdown === false ? PLAIN : MARKDOWN;
}

/**
 * `YYYY-MM-DD HH:MM:SS UTC`
 */
export function formatTimestamp(date: Date): string {
	const iso = date.toISOString();
	return `${iso.slice(0, 10)} ${iso.slice(11, 19)} UTC`;
}

export function actionSymbol(action: string): string {
	return ACTION_SYMBOLS[action] ?? DEFAULT_ACTION_SYMBOL;
}

/**
 * Render one resource change: symbol + bold name, then one bullet per attribute diff.
 */
export function formatResourceChange(change: ResourceChange, options: FormatOptions = {}): string {
	const m = markupFor(options);
	const lines = [`${actionSymbol(change.action)} ${m.bold(m.text(displayName(change)))}`];
	for (const summary of changeSummary(change)) {
		lines.push(`  • ${m.text(summary)}`);
	}
	return lines.join("\n");
}

function metadataLines(event: DriftEvent, m: Markup): string[] {
	return [
		`${m.bold("Environment:")} ${m.text(event.environment)}`,
		`${m.bold("Branch:")} ${m.text(event.branch)}`,
		`${m.bold("Time:")} ${m.text(formatTimestamp(event.timestamp))}`,
	];
}

function wantsLink(event: DriftEvent, options: FormatOptions): boolean {
	return options.includeRunLink !== false && event.runUrl.length > 0;
}

export function formatDriftMessage(event: DriftEvent, options: FormatOptions = {}): string {
	const m = markupFor(options);
	const lines = [`🚨 ${m.bold("Infrastructure Drift Detected")}`, ""];

	lines.push(...metadataLines(event, m));
	lines.push(`${m.bold("Resources Affected:")} ${totalChanges(event)}`);
	lines.push("");

	const counts = Object.entries(changesByAction(event)).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
	if (counts.length > 0) {
		const summary = counts.map(([action, count]) => `${action}: ${count}`).join(", ");
		lines.push(`${m.bold("Changes:")} ${m.text(summary)}`);
		lines.push("");
	}

	lines.push(SECTION_SEPARATOR);
	lines.push("");

	for (const change of event.changes) {
		lines.push(formatResourceChange(change, options));
		lines.push("");
	}

	if (wantsLink(event, options)) {
		lines.push(m.link("View Full Report", event.runUrl));
	}

	return lines.join("\n");
}

export function formatNoDriftMessage(event: DriftEvent, options: FormatOptions = {}): string {
	const m = markupFor(options);
	const lines = [
		`✅ ${m.bold("No Infrastructure Drift Detected")}`,
		"",
		...metadataLines(event, m),
		"",
		m.text("All infrastructure resources match their expected state."),
	];

	if (wantsLink(event, options)) {
		lines.push("");
		lines.push(m.link("View Details", event.runUrl));
	}

	return lines.join("\n");
}

export type ComposeOptions = FormatOptions & {
	maxLength: number;
	logger?: Logger;
};

/**
 * Render the variant matching `event.driftDetected` and split it into sendable parts.
 * Throws SizeViolationError when a part cannot be brought under `maxLength`.
 */
export function composeNotification(event: DriftEvent, options: ComposeOptions): MessagePart[] {
	const message = event.driftDetected
		? formatDriftMessage(event, options)
		: formatNoDriftMessage(event, options);
	const parts = splitMessage(message, {
		maxLength: options.maxLength,
		markdown: options.markdown !== false,
	});

	options.logger?.debug(
		{
			messageLength: message.length,
			partsCount: parts.length,
			driftDetected: event.driftDetected,
		},
		`message formatted: ${message.length} chars, ${parts.length} part(s)`,
	);

	return parts;
}
