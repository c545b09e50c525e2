import { describe, expect, it } from "vitest";

import { SECTION_SEPARATOR } from "../../src/telegram/constants.js";
import {
	SizeViolationError,
	fitToLimit,
	safeCutIndex,
	splitMessage,
	splitOnLines,
} from "../../src/telegram/split.js";

function block(index: number): string {
	return `block ${index}\n${"x".repeat(60)}`;
}

const markdownHeader = (i: number, n: number) => `🔔 *Drift Alert \\(Part ${i}/${n}\\)*\n\n`;
const plainHeader = (i: number, n: number) => `🔔 Drift Alert (Part ${i}/${n})\n\n`;

describe("telegram/split", () => {
	it("returns a single part without a header when the message fits", () => {
		const message = `HEAD\n${SECTION_SEPARATOR}\n\n${block(1)}`;
		expect(splitMessage(message)).toEqual([{ partNumber: 1, totalParts: 1, content: message }]);
	});

	it("rejects limits outside 101..4096", () => {
		expect(() => splitMessage("x", { maxLength: 100 })).toThrow(RangeError);
		expect(() => splitMessage("x", { maxLength: 4097 })).toThrow(RangeError);
		expect(() => splitMessage("x", { maxLength: 150.5 })).toThrow(RangeError);
		expect(splitMessage("x", { maxLength: 101 })).toHaveLength(1);
	});

	it("packs whole blocks greedily and keeps the header in the first part", () => {
		const blocks = [1, 2, 3, 4, 5, 6].map(block);
		const message = `HEAD\n${SECTION_SEPARATOR}\n\n${blocks.join("\n\n")}`;

		const parts = splitMessage(message, { maxLength: 300 });

		expect(parts.map((part) => part.content)).toEqual([
			`${markdownHeader(1, 3)}HEAD\n${SECTION_SEPARATOR}\n\n${blocks[0]}\n\n${blocks[1]}`,
			`${markdownHeader(2, 3)}${blocks[2]}\n\n${blocks[3]}`,
			`${markdownHeader(3, 3)}${blocks[4]}\n\n${blocks[5]}`,
		]);
		expect(parts.map((part) => [part.partNumber, part.totalParts])).toEqual([
			[1, 3],
			[2, 3],
			[3, 3],
		]);
	});

	it("uses a plain header for plain-text messages", () => {
		const blocks = [1, 2, 3, 4, 5, 6].map(block);
		const message = `HEAD\n${SECTION_SEPARATOR}\n\n${blocks.join("\n\n")}`;

		const parts = splitMessage(message, { maxLength: 300, markdown: false });

		expect(parts[1]?.content).toBe(`${plainHeader(2, 3)}${blocks[2]}\n\n${blocks[3]}`);
	});

	it("skips blank sections", () => {
		const message = `${"a".repeat(120)}\n\n\n\n\n\n${"b".repeat(120)}`;
		const parts = splitMessage(message, { maxLength: 250, markdown: false });
		expect(parts.map((part) => part.content)).toEqual([
			`${plainHeader(1, 2)}${"a".repeat(120)}`,
			`${plainHeader(2, 2)}${"b".repeat(120)}`,
		]);
	});

	it("falls back to line boundaries for an oversized block", () => {
		const lines = Array.from({ length: 10 }, (_, i) => `row ${i} ${"y".repeat(10)}`);
		const parts = splitMessage(lines.join("\n"), { maxLength: 150, markdown: false });

		expect(parts.map((part) => part.content)).toEqual([
			`${plainHeader(1, 4)}${lines.slice(0, 3).join("\n")}`,
			`${plainHeader(2, 4)}${lines.slice(3, 6).join("\n")}`,
			`${plainHeader(3, 4)}${lines.slice(6, 9).join("\n")}`,
			`${plainHeader(4, 4)}${lines[9]}`,
		]);
	});

	it("hard-cuts a single line longer than the limit", () => {
		const parts = splitMessage("z".repeat(120), { maxLength: 150, markdown: false });
		expect(parts.map((part) => part.content)).toEqual([
			`${plainHeader(1, 3)}${"z".repeat(50)}`,
			`${plainHeader(2, 3)}${"z".repeat(50)}`,
			`${plainHeader(3, 3)}${"z".repeat(20)}`,
		]);
	});

	it("closes and reopens bold when an over-long title line is hard-cut", () => {
		const title = `➕ *${"\\.".repeat(40)}*`;
		const parts = splitMessage(title, { maxLength: 150 });

		expect(parts.map((part) => part.content)).toEqual([
			`${markdownHeader(1, 2)}➕ *${"\\.".repeat(23)}*`,
			`${markdownHeader(2, 2)}*${"\\.".repeat(17)}*`,
		]);
	});

	it("never leaves half a surrogate pair at the smallest limit", () => {
		const parts = splitMessage("🔔🔔🔔", { maxLength: 101, markdown: false });
		expect(parts.map((part) => part.content)).toEqual([
			`${plainHeader(1, 3)}🔔`,
			`${plainHeader(2, 3)}🔔`,
			`${plainHeader(3, 3)}🔔`,
		]);
	});

	it("keeps every part within the limit for large input", () => {
		const blocks = Array.from({ length: 200 }, (_, i) => block(i));
		const message = `HEAD\n${SECTION_SEPARATOR}\n\n${blocks.join("\n\n")}`;
		const parts = splitMessage(message, { maxLength: 4096 });

		expect(parts.length).toBeGreaterThan(1);
		for (const part of parts) {
			expect(part.content.length).toBeLessThanOrEqual(4096);
		}
		const bodies = parts.map((part, i) =>
			part.content.slice(markdownHeader(i + 1, parts.length).length),
		);
		expect(bodies.join("\n\n")).toBe(message);
	});

	describe("safeCutIndex", () => {
		it("does not separate an escape from the escaped character", () => {
			expect(safeCutIndex("ab\\.cd", 3)).toBe(2);
		});

		it("allows a cut after an escaped backslash", () => {
			expect(safeCutIndex("ab\\\\cd", 4)).toBe(4);
		});

		it("does not split a surrogate pair", () => {
			expect(safeCutIndex("a🔔b", 2)).toBe(1);
		});

		it("leaves an ordinary cut alone", () => {
			expect(safeCutIndex("abcdef", 3)).toBe(3);
		});

		it("moves forward past a pair that opens the text", () => {
			expect(safeCutIndex("🔔b", 1)).toBe(2);
			expect(safeCutIndex("\\.ab", 1)).toBe(2);
		});
	});

	describe("splitOnLines", () => {
		it("trims leading newlines from the remainder", () => {
			expect(splitOnLines("aaaa\n\n\nbbbb", 6)).toEqual(["aaaa", "bbbb"]);
		});

		it("repeats the bold markers on every piece of a cut span", () => {
			expect(splitOnLines(`*${"a".repeat(20)}*`, 10, true)).toEqual([
				`*${"a".repeat(8)}*`,
				`*${"a".repeat(8)}*`,
				`*${"a".repeat(4)}*`,
			]);
		});

		it("cuts bold spans without separating escape pairs", () => {
			expect(splitOnLines(`x*${"\\.".repeat(6)}*`, 6, true)).toEqual([
				"x*\\.*",
				"*\\.\\.*",
				"*\\.\\.*",
				"*\\.*",
			]);
		});

		it("moves an opening marker that would close an empty span", () => {
			expect(splitOnLines(`ab*${"c".repeat(10)}*`, 4, true)).toEqual([
				"ab",
				"*cc*",
				"*cc*",
				"*cc*",
				"*cc*",
				"*cc*",
			]);
		});

		it("leaves asterisks alone in plain text", () => {
			expect(splitOnLines(`*${"a".repeat(8)}*`, 5)).toEqual(["*aaaa", "aaaa*"]);
		});
	});

	describe("fitToLimit", () => {
		it("leaves content within the limit untouched", () => {
			expect(fitToLimit("short", "", 150, true, 1)).toBe("short");
		});

		it("truncates with an escaped ellipsis", () => {
			const content = `HHHHH${"a".repeat(200)}`;
			const result = fitToLimit(content, "HHHHH", 150, true, 1);
			expect(result).toBe(`HHHHH${"a".repeat(139)}\\.\\.\\.`);
			expect(result).toHaveLength(150);
		});

		it("uses a plain ellipsis for plain text", () => {
			const result = fitToLimit("a".repeat(200), "", 150, false, 1);
			expect(result).toBe(`${"a".repeat(147)}...`);
		});

		it("throws when the header cannot survive truncation", () => {
			const header = "H".repeat(148);
			expect(() => fitToLimit(`${header}${"a".repeat(52)}`, header, 150, true, 2)).toThrow(
				SizeViolationError,
			);
		});
	});
});
