/**
 * Telegram message sizing and layout constants.
 *
 * Centralised here so the composer, splitter and config schema agree.
 */

/**
 * Telegram Bot API hard character limit per message.
 *
 * @see https://core.telegram.org/bots/api#sendmessage
 */
export const TELEGRAM_API_CHAR_LIMIT = 4096;

/**
 * Characters reserved while deciding where to cut, so the "Part i/n" header
 * added afterwards still fits under the hard limit.
 */
export const PART_HEADER_BUFFER = 100;

/**
 * Smallest accepted maxMessageLength: the effective limit must stay positive.
 */
export const MIN_MESSAGE_LENGTH = PART_HEADER_BUFFER + 1;

/**
 * Line separating the alert header/metadata from the per-resource blocks.
 * The splitter keeps everything up to it together in the first part.
 */
export const SECTION_SEPARATOR = "━━━━━━━━━━━━━━━━";

/**
 * Pause between parts of one notification so Telegram keeps them in order.
 */
export const INTER_PART_DELAY_MS = 100;
