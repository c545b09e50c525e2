/**
 * Telegram MarkdownV2 escaping.
 *
 * Apply to every dynamic string placed into formatted output. Never apply to
 * markup the composer inserts itself (bold markers, links), or it is escaped twice.
 *
 * @see https://core.telegram.org/bots/api#markdownv2-style
 */

// MarkdownV2 reserved characters, plus the backslash that escapes them.
const MARKDOWN_V2_SPECIAL_CHARS = /([_*[\]()~`>#+\-=|{}.!\\])/g;

// Inside the (...) part of a link only ')' and '\' are reserved.
const LINK_URL_SPECIAL_CHARS = /([)\\])/g;

export function escapeMarkdownV2(text: string): string {
	return text.replace(MARKDOWN_V2_SPECIAL_CHARS, "\\$1");
}

export function escapeLinkUrl(url: string): string {
	return url.replace(LINK_URL_SPECIAL_CHARS, "\\$1");
}
