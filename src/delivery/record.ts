import { randomBytes } from "node:crypto";

import type { DriftEvent } from "../drift/types.js";
import type { MessagePart } from "../telegram/split.js";
import type { TransportErrorKind } from "../telegram/transport.js";
import { compactUtcStamp } from "../utils.js";

/**
 * Lifecycle: pending → sending ⇄ retrying → sent
 *                              ↘ failed
 * A suppressed no-drift notification goes straight from pending to sent.
 */
export type DeliveryStatus = "pending" | "sending" | "retrying" | "sent" | "failed";

export type DeliveryErrorKind = TransportErrorKind | "size_violation";

export type DeliveryError = {
	kind: DeliveryErrorKind;
	message: string;
	retryable: boolean;
};

export type NotificationRecord = {
	id: string;
	runId: string;
	event: DriftEvent;
	channelId: string;
	parts: MessagePart[];
	status: DeliveryStatus;
	/** Retries across every part of this record. Never exceeds the configured maximum. */
	retryCount: number;
	createdAt: Date;
	sentAt?: Date;
	lastError?: DeliveryError;
};

export function generateRunId(): string {
	return randomBytes(4).toString("hex");
}

/**
 * `drift_<runId>_<YYYYMMDD_HHMMSS>` (UTC).
 */
export function notificationId(runId: string, createdAt: Date): string {
	return `drift_${runId}_${compactUtcStamp(createdAt)}`;
}

export function createNotificationRecord(params: {
	event: DriftEvent;
	channelId: string;
	runId?: string;
	now?: Date;
}): NotificationRecord {
	const createdAt = params.now ?? new Date();
	const runId = params.runId ?? generateRunId();
	return {
		id: notificationId(runId, createdAt),
		runId,
		event: params.event,
		channelId: params.channelId,
		parts: [],
		status: "pending",
		retryCount: 0,
		createdAt,
	};
}

export function markSending(record: NotificationRecord): void {
	record.status = "sending";
}

export function markRetrying(record: NotificationRecord, error: DeliveryError): void {
	record.status = "retrying";
	record.retryCount += 1;
	record.lastError = error;
}

export function markSent(record: NotificationRecord, sentAt: Date = new Date()): void {
	record.status = "sent";
	record.sentAt = sentAt;
}

export function markFailed(record: NotificationRecord, error: DeliveryError): void {
	record.status = "failed";
	record.lastError = error;
}

export function isTerminal(record: NotificationRecord): boolean {
	return record.status === "sent" || record.status === "failed";
}

/**
 * Parts confirmed by the platform. After a partial failure these stay posted.
 */
export function sentParts(record: NotificationRecord): MessagePart[] {
	return record.parts.filter((part) => part.remoteMessageId !== undefined);
}
