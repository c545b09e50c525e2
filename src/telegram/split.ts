/**
 * Split a composed message into parts that fit Telegram's per-message limit.
 *
 * Cuts prefer resource-block boundaries (blank lines), then line boundaries.
 * A block is only ever cut when it cannot fit in a part on its own.
 */

import {
	MIN_MESSAGE_LENGTH,
	PART_HEADER_BUFFER,
	SECTION_SEPARATOR,
	TELEGRAM_API_CHAR_LIMIT,
} from "./constants.js";

export type MessagePart = {
	/** 1-based. */
	partNumber: number;
	totalParts: number;
	content: string;
	/** Set once Telegram has confirmed the send. */
	remoteMessageId?: string;
};

export type SplitOptions = {
	/** Hard per-message limit. Default: 4096. */
	maxLength?: number;
	/** Whether content is MarkdownV2 (affects part headers and the ellipsis). Default: true. */
	markdown?: boolean;
};

/**
 * A part could not be brought under the hard limit. This is a formatting bug;
 * an oversized message must never be sent.
 */
export class SizeViolationError extends Error {
	constructor(
		public readonly partNumber: number,
		public readonly length: number,
		public readonly maxLength: number,
	) {
		super(`Part ${partNumber} is ${length} chars, exceeds limit of ${maxLength}`);
		this.name = "SizeViolationError";
	}
}

const SECTION_BREAK = "\n\n";

function partHeader(partNumber: number, totalParts: number, markdown: boolean): string {
	return markdown
		? `🔔 *Drift Alert \\(Part ${partNumber}/${totalParts}\\)*\n\n`
		: `🔔 Drift Alert (Part ${partNumber}/${totalParts})\n\n`;
}

function ellipsis(markdown: boolean): string {
	return markdown ? "\\.\\.\\." : "...";
}

function trimNewlines(text: string): string {
	return text.replace(/^\n+|\n+$/g, "");
}

/**
 * Move a hard cut back so it does not separate an escape backslash from the
 * character it escapes, or split a surrogate pair.
 */
export function safeCutIndex(text: string, cut: number): number {
	let index = Math.min(cut, text.length);

	const code = text.charCodeAt(index - 1);
	if (index < text.length && code >= 0xd800 && code <= 0xdbff) {
		index -= 1;
	}

	let backslashes = 0;
	while (index - backslashes - 1 >= 0 && text[index - backslashes - 1] === "\\") {
		backslashes += 1;
	}
	if (backslashes % 2 === 1) {
		index -= 1;
	}

	if (index > 0) return index;
	// The pair opens the text: keep it whole in the first piece.
	return Math.min(cut + 1, text.length);
}

/**
 * Index of the `*` opening a bold span still unclosed at the end of `text`,
 * or -1. Escaped asterisks are literal.
 */
function openBoldIndex(text: string): number {
	let open = -1;
	for (let i = 0; i < text.length; i++) {
		if (text[i] === "\\") {
			i += 1;
		} else if (text[i] === "*") {
			open = open === -1 ? i : -1;
		}
	}
	return open;
}

/**
 * Greedy pass over blank-line separated sections. The header (everything up to
 * and including the separator line) opens the first chunk.
 */
function splitOnSections(message: string, limit: number): string[] {
	const separatorIndex = message.indexOf(SECTION_SEPARATOR);
	let current = "";
	let body = message;
	if (separatorIndex > 0) {
		const end = separatorIndex + SECTION_SEPARATOR.length;
		current = message.slice(0, end);
		body = message.slice(end);
	}

	const chunks: string[] = [];
	for (const raw of body.split(SECTION_BREAK)) {
		const section = trimNewlines(raw);
		if (section.trim().length === 0) continue;

		const candidate = current ? `${current}${SECTION_BREAK}${section}` : section;
		if (candidate.length > limit && current) {
			chunks.push(current);
			current = section;
		} else {
			current = candidate;
		}
	}
	if (current) {
		chunks.push(current);
	}
	return chunks;
}

/**
 * Fallback for a chunk that is too large on its own: cut at the last newline
 * before the limit, or at the limit when the line itself is too long.
 *
 * In MarkdownV2 a hard cut inside a bold span closes it at the end of the
 * piece and reopens it at the start of the next, so each piece parses alone.
 */
export function splitOnLines(chunk: string, limit: number, markdown = false): string[] {
	const pieces: string[] = [];
	let remaining = chunk;

	while (remaining.length > limit) {
		const newline = remaining.lastIndexOf("\n", limit);
		if (newline > 0) {
			pieces.push(remaining.slice(0, newline).replace(/\n+$/, ""));
			remaining = remaining.slice(newline).replace(/^\n+/, "");
			continue;
		}

		// Leave room for a closing `*`.
		let cut = safeCutIndex(remaining, markdown ? limit - 1 : limit);
		let reopen = "";
		if (markdown) {
			const open = openBoldIndex(remaining.slice(0, cut));
			if (open !== -1 && cut - open >= 2) {
				reopen = "*";
			} else if (open > 0) {
				// The marker would close an empty span; move it to the next piece.
				cut = open;
			}
		}
		pieces.push(`${remaining.slice(0, cut).replace(/\n+$/, "")}${reopen}`);
		remaining = `${reopen}${remaining.slice(cut).replace(/^\n+/, "")}`;
	}
	if (remaining.length > 0) {
		pieces.push(remaining);
	}
	return pieces;
}

/**
 * Truncate content to `maxLength`, ending in an ellipsis. The header must survive.
 */
export function fitToLimit(
	content: string,
	header: string,
	maxLength: number,
	markdown: boolean,
	partNumber: number,
): string {
	if (content.length <= maxLength) return content;

	const marker = ellipsis(markdown);
	const cut = safeCutIndex(content, maxLength - marker.length);
	const truncated = `${content.slice(0, cut)}${marker}`;
	if (cut < header.length || truncated.length > maxLength) {
		throw new SizeViolationError(partNumber, content.length, maxLength);
	}
	return truncated;
}

export function splitMessage(message: string, options: SplitOptions = {}): MessagePart[] {
	const maxLength = options.maxLength ?? TELEGRAM_API_CHAR_LIMIT;
	const markdown = options.markdown !== false;
	if (
		!Number.isInteger(maxLength) ||
		maxLength < MIN_MESSAGE_LENGTH ||
		maxLength > TELEGRAM_API_CHAR_LIMIT
	) {
		throw new RangeError(
			`maxLength must be an integer between ${MIN_MESSAGE_LENGTH} and ${TELEGRAM_API_CHAR_LIMIT}, got ${maxLength}`,
		);
	}

	const effectiveLimit = maxLength - PART_HEADER_BUFFER;
	if (message.length <= effectiveLimit) {
		return [{ partNumber: 1, totalParts: 1, content: message }];
	}

	const chunks = splitOnSections(message, effectiveLimit).flatMap((chunk) =>
		chunk.length > effectiveLimit ? splitOnLines(chunk, effectiveLimit, markdown) : [chunk],
	);
	const totalParts = chunks.length;

	return chunks.map((chunk, index) => {
		const partNumber = index + 1;
		const header = totalParts > 1 ? partHeader(partNumber, totalParts, markdown) : "";
		const content = fitToLimit(`${header}${chunk}`, header, maxLength, markdown, partNumber);
		return { partNumber, totalParts, content };
	});
}
