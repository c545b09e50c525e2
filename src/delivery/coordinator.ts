import type { Logger } from "pino";

import type { NotificationConfig } from "../config/config.js";
import type { DriftEvent } from "../drift/types.js";
import { TimeoutError, withDeadline } from "../infra/deadline.js";
import { retryAsync } from "../infra/retry.js";
import { getChildLogger } from "../logging.js";
import { INTER_PART_DELAY_MS } from "../telegram/constants.js";
import { composeNotification } from "../telegram/format.js";
import { SizeViolationError } from "../telegram/split.js";
import {
	type MessageTransport,
	type TransportError,
	classifyTelegramError,
} from "../telegram/transport.js";
import { sleep } from "../utils.js";
import {
	type DeliveryError,
	type NotificationRecord,
	createNotificationRecord,
	markFailed,
	markRetrying,
	markSending,
	markSent,
} from "./record.js";

export type DeliveryConfig = Pick<
	NotificationConfig,
	| "channelId"
	| "maxRetries"
	| "initialDelayMs"
	| "multiplier"
	| "maxDelayMs"
	| "markdown"
	| "maxMessageLength"
	| "includeRunLink"
	| "notifyOnNoDrift"
	| "deadlineMs"
>;

export type DeliveryCoordinatorOptions = {
	transport: MessageTransport;
	config: DeliveryConfig;
	/** Parent logger; each notification gets a child bound to its id. */
	logger?: Logger;
	/** Pause between parts of one notification. Default: 100ms. */
	interPartDelayMs?: number;
	now?: () => Date;
};

export type DeliverOptions = {
	runId?: string;
	/** Overrides `config.deadlineMs` for this notification. */
	deadlineMs?: number;
};

function toDeliveryError(error: TransportError): DeliveryError {
	return { kind: error.kind, message: error.message, retryable: error.retryable };
}

/**
 * Drives one drift event through compose → split → sequential send.
 *
 * Parts of a notification go out strictly in order, one at a time. Each part is
 * retried on transient failures with exponential backoff; a fatal failure or an
 * exhausted budget fails the whole record and stops further parts. Parts already
 * posted stay posted.
 *
 * Independent deliver() calls share no mutable state and may run concurrently.
 */
export class DeliveryCoordinator {
	private readonly transport: MessageTransport;
	private readonly config: DeliveryConfig;
	private readonly logger: Logger;
	private readonly interPartDelayMs: number;
	private readonly now: () => Date;

	constructor(options: DeliveryCoordinatorOptions) {
		this.transport = options.transport;
		this.config = options.config;
		this.logger = options.logger ?? getChildLogger({ module: "delivery" });
		this.interPartDelayMs = options.interPartDelayMs ?? INTER_PART_DELAY_MS;
		this.now = options.now ?? (() => new Date());
	}

	async deliver(event: DriftEvent, options: DeliverOptions = {}): Promise<NotificationRecord> {
		const record = createNotificationRecord({
			event,
			channelId: this.config.channelId,
			runId: options.runId,
			now: this.now(),
		});
		const logger = this.logger.child({ notificationId: record.id, runId: record.runId });

		logger.info(
			{
				environment: event.environment,
				driftDetected: event.driftDetected,
				totalChanges: event.changes.length,
			},
			"starting notification send",
		);

		if (!event.driftDetected && !this.config.notifyOnNoDrift) {
			markSent(record, this.now());
			logger.info("skipping notification: no drift detected and notifyOnNoDrift is off");
			return record;
		}

		try {
			record.parts = composeNotification(event, {
				maxLength: this.config.maxMessageLength,
				markdown: this.config.markdown,
				includeRunLink: this.config.includeRunLink,
				logger,
			});
		} catch (err) {
			if (!(err instanceof SizeViolationError)) throw err;
			markFailed(record, { kind: "size_violation", message: err.message, retryable: false });
			logger.error(
				{ partNumber: err.partNumber, length: err.length, maxLength: err.maxLength },
				"message could not be split under the size limit; nothing sent",
			);
			return record;
		}

		const deadlineMs = options.deadlineMs ?? this.config.deadlineMs;
		if (deadlineMs === undefined) {
			await this.sendParts(record, logger);
		} else {
			await this.sendPartsWithDeadline(record, logger, deadlineMs);
		}

		if (record.status === "sent") {
			logger.info(
				{ status: record.status, partsSent: record.parts.length, retryCount: record.retryCount },
				"notification sent",
			);
		}
		return record;
	}

	private async sendPartsWithDeadline(
		record: NotificationRecord,
		logger: Logger,
		deadlineMs: number,
	): Promise<void> {
		try {
			await withDeadline(
				(signal) => this.sendParts(record, logger, signal),
				deadlineMs,
				`notification ${record.id}`,
			);
		} catch (err) {
			if (!(err instanceof TimeoutError)) throw err;
			markFailed(record, { kind: "timeout", message: err.message, retryable: true });
			logger.error(
				{ deadlineMs, retryCount: record.retryCount },
				"delivery deadline exceeded; abandoning remaining attempts",
			);
		}
	}

	private async sendParts(
		record: NotificationRecord,
		logger: Logger,
		signal?: AbortSignal,
	): Promise<void> {
		const { channelId, maxRetries, markdown } = this.config;
		markSending(record);

		for (const part of record.parts) {
			const partLabel = `${part.partNumber}/${part.totalParts}`;
			logger.debug(
				{ partNumber: part.partNumber, totalParts: part.totalParts, contentLength: part.content.length },
				`sending message part ${partLabel}`,
			);

			let remoteMessageId: string;
			try {
				remoteMessageId = await retryAsync(
					() => this.transport.sendMessage(channelId, part.content, markdown),
					{
						maxAttempts: maxRetries,
						initialDelayMs: this.config.initialDelayMs,
						multiplier: this.config.multiplier,
						maxDelayMs: this.config.maxDelayMs,
						signal,
						label: `part ${partLabel}`,
						shouldRetry: (err) =>
							!signal?.aborted &&
							classifyTelegramError(err).retryable &&
							record.retryCount < maxRetries,
						retryAfterMs: (err) => classifyTelegramError(err).retryAfterMs,
						onRetry: (err, info) => {
							const error = classifyTelegramError(err);
							markRetrying(record, toDeliveryError(error));
							logger.warn(
								{
									partNumber: part.partNumber,
									attempt: info.attempt,
									maxAttempts: info.maxAttempts,
									errorKind: error.kind,
									retryCount: record.retryCount,
								},
								`attempt ${info.attempt}/${info.maxAttempts} failed: ${error.message}. Retrying in ${info.delayMs}ms`,
							);
						},
					},
				);
			} catch (err) {
				// The deadline handler owns the record once it has fired.
				if (signal?.aborted) return;

				const error = classifyTelegramError(err);
				markFailed(record, toDeliveryError(error));
				logger.error(
					{
						partNumber: part.partNumber,
						errorKind: error.kind,
						retryable: error.retryable,
						retryCount: record.retryCount,
						partsSent: part.partNumber - 1,
					},
					`failed to send message part ${partLabel}: ${error.message}`,
				);
				return;
			}

			// A send that completes after the deadline must not touch the failed record.
			if (signal?.aborted) return;
			part.remoteMessageId = remoteMessageId;
			markSending(record);
			logger.debug(
				{ partNumber: part.partNumber, remoteMessageId: part.remoteMessageId },
				`message part ${partLabel} sent`,
			);

			if (part.partNumber < part.totalParts) {
				await sleep(this.interPartDelayMs, signal);
			}
		}

		markSent(record, this.now());
	}
}
