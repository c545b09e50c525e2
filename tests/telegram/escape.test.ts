import { describe, expect, it } from "vitest";

import { escapeLinkUrl, escapeMarkdownV2 } from "../../src/telegram/escape.js";

describe("telegram/escape", () => {
	it("prefixes every MarkdownV2 reserved character", () => {
		expect(escapeMarkdownV2("_*[]()~`>#+-=|{}.!")).toBe(
			"\\_\\*\\[\\]\\(\\)\\~\\`\\>\\#\\+\\-\\=\\|\\{\\}\\.\\!",
		);
	});

	it("escapes resource names and versions", () => {
		expect(escapeMarkdownV2("aws_instance.web")).toBe("aws\\_instance\\.web");
		expect(escapeMarkdownV2("v1.2-rc!")).toBe("v1\\.2\\-rc\\!");
	});

	it("escapes a literal backslash", () => {
		expect(escapeMarkdownV2("C:\\temp")).toBe("C:\\\\temp");
	});

	it("leaves plain text untouched", () => {
		expect(escapeMarkdownV2("main branch 42 → ok")).toBe("main branch 42 → ok");
		expect(escapeMarkdownV2("")).toBe("");
	});

	it("escapes only ')' and '\\' inside link targets", () => {
		expect(escapeLinkUrl("https://ci.example.test/runs/(7)?a=b_c")).toBe(
			"https://ci.example.test/runs/(7\\)?a=b_c",
		);
		expect(escapeLinkUrl("https://ci.example.test/a\\b")).toBe("https://ci.example.test/a\\\\b");
	});
});
