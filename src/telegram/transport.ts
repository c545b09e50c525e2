import { Bot, GrammyError, HttpError } from "grammy";

import { isAbortError, isTimeoutError, isTransientNetworkError } from "../infra/network-errors.js";
import { isRetryableKind } from "../infra/retry.js";

/**
 * Closed classification of a failed send. Retryability is derived from the kind
 * (see isRetryableKind), never from an error's class or type name.
 */
export type TransportErrorKind =
	| "network"
	| "timeout"
	| "rate_limited"
	| "invalid_credential"
	| "bad_request"
	| "rejected"
	| "unknown";

export class TransportError extends Error {
	readonly retryable: boolean;
	/** Server-suggested wait before retrying, when the platform sent one. */
	readonly retryAfterMs?: number;

	constructor(
		public readonly kind: TransportErrorKind,
		message: string,
		options: { retryAfterMs?: number; cause?: unknown } = {},
	) {
		super(message, { cause: options.cause });
		this.name = "TransportError";
		this.retryable = isRetryableKind(kind);
		this.retryAfterMs = options.retryAfterMs;
	}
}

/**
 * Outbound channel for message parts. Must tolerate concurrent calls from
 * independent notifications.
 */
export interface MessageTransport {
	/**
	 * Send one message and return the platform's message id.
	 * Rejects with a TransportError.
	 */
	sendMessage(channelId: string, text: string, useMarkup: boolean): Promise<string>;
}

export type BotIdentity = {
	id: number;
	first_name: string;
	username: string;
};

/**
 * The slice of grammy's `Api` the transport uses.
 */
export type TelegramApi = {
	sendMessage(
		chatId: string,
		text: string,
		other?: { parse_mode?: "MarkdownV2" },
	): Promise<{ message_id: number }>;
	getMe(): Promise<BotIdentity>;
};

export type GrammyTransportOptions = {
	token: string;
	/** Per-request timeout. Default: 30. */
	timeoutSeconds?: number;
	/** Use an existing API client instead of creating a bot from the token. */
	api?: TelegramApi;
};

function classifyStatus(error: GrammyError): TransportError {
	const description = `${error.error_code}: ${error.description}`;
	const code = error.error_code;

	if (code === 429) {
		const retryAfter = error.parameters.retry_after;
		return new TransportError("rate_limited", `rate limited (${description})`, {
			retryAfterMs: retryAfter !== undefined ? retryAfter * 1000 : undefined,
			cause: error,
		});
	}
	// Telegram answers 404 for a token that does not belong to any bot.
	if (code === 401 || code === 404) {
		return new TransportError("invalid_credential", `invalid bot token (${description})`, {
			cause: error,
		});
	}
	if (code === 400) {
		return new TransportError("bad_request", `bad request (${description})`, { cause: error });
	}
	if (code >= 500) {
		return new TransportError("network", `server error (${description})`, { cause: error });
	}
	return new TransportError("rejected", `rejected (${description})`, { cause: error });
}

/**
 * Map anything a Telegram call can throw onto a TransportError.
 */
export function classifyTelegramError(err: unknown): TransportError {
	if (err instanceof TransportError) {
		return err;
	}
	if (err instanceof GrammyError) {
		return classifyStatus(err);
	}
	if (err instanceof HttpError) {
		return isTimeoutError(err) || isAbortError(err.error)
			? new TransportError("timeout", `request timed out: ${err.message}`, { cause: err })
			: new TransportError("network", `network error: ${err.message}`, { cause: err });
	}
	if (isTimeoutError(err)) {
		return new TransportError("timeout", String(err), { cause: err });
	}
	if (isTransientNetworkError(err)) {
		return new TransportError("network", String(err), { cause: err });
	}
	return new TransportError("unknown", err instanceof Error ? err.message : String(err), {
		cause: err,
	});
}

/**
 * Telegram Bot API transport backed by grammy.
 *
 * Retries are the caller's job: no auto-retry middleware is installed, so
 * every failure surfaces once, classified.
 */
export class GrammyTransport implements MessageTransport {
	private readonly api: TelegramApi;

	constructor(options: GrammyTransportOptions) {
		this.api =
			options.api ??
			new Bot(options.token, { client: { timeoutSeconds: options.timeoutSeconds ?? 30 } }).api;
	}

	async sendMessage(channelId: string, text: string, useMarkup: boolean): Promise<string> {
		try {
			const message = await this.api.sendMessage(
				channelId,
				text,
				useMarkup ? { parse_mode: "MarkdownV2" } : {},
			);
			return String(message.message_id);
		} catch (err) {
			throw classifyTelegramError(err);
		}
	}

	/**
	 * Confirm the token belongs to a bot (getMe).
	 */
	async verify(): Promise<BotIdentity> {
		try {
			return await this.api.getMe();
		} catch (err) {
			throw classifyTelegramError(err);
		}
	}
}

/**
 * Format bot info for display.
 */
export function formatBotInfo(botInfo: BotIdentity): string {
	return `Bot: ${botInfo.first_name} (@${botInfo.username}) [ID: ${botInfo.id}]`;
}
