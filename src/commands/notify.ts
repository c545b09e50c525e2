import chalk from "chalk";
import type { Command } from "commander";

import {
	type NotificationConfig,
	loadNotificationConfig,
	sanitizeConfigForLogging,
} from "../config/config.js";
import { type DeliveryCoordinatorOptions, DeliveryCoordinator } from "../delivery/coordinator.js";
import { readDriftReport } from "../drift/report.js";
import { applyEnvironmentOverride } from "../drift/types.js";
import { ReportNotFoundError, ValidationError } from "../errors.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";
import { composeNotification } from "../telegram/format.js";
import { GrammyTransport, type MessageTransport } from "../telegram/transport.js";

export type NotifyOptions = {
	report: string;
	environment?: string;
	runId?: string;
	dryRun?: boolean;
};

export type NotifyDeps = {
	env?: NodeJS.ProcessEnv;
	createTransport?: (config: NotificationConfig) => MessageTransport;
	coordinator?: Pick<DeliveryCoordinatorOptions, "interPartDelayMs" | "now">;
};

export function createTelegramTransport(config: NotificationConfig): GrammyTransport {
	return new GrammyTransport({
		token: config.botToken,
		timeoutSeconds: config.requestTimeoutSeconds,
	});
}

/**
 * Run one notification. Resolves to the process exit code: 0 when the record
 * ends `sent` (suppression included), 1 otherwise.
 */
export async function runNotifyCommand(opts: NotifyOptions, deps: NotifyDeps = {}): Promise<number> {
	const logger = getChildLogger({ module: "cmd-notify" });

	try {
		const config = loadNotificationConfig(deps.env);
		logger.debug({ config: sanitizeConfigForLogging(config) }, "configuration loaded");

		const event = applyEnvironmentOverride(readDriftReport(opts.report), opts.environment);

		if (opts.dryRun) {
			printDryRun(config, event.driftDetected, () =>
				composeNotification(event, {
					maxLength: config.maxMessageLength,
					markdown: config.markdown,
					includeRunLink: config.includeRunLink,
					logger,
				}),
			);
			return 0;
		}

		const transport = (deps.createTransport ?? createTelegramTransport)(config);
		const coordinator = new DeliveryCoordinator({ transport, config, ...deps.coordinator });
		const record = await coordinator.deliver(event, { runId: opts.runId });

		if (record.status !== "sent") {
			const reason = record.lastError?.message ?? record.status;
			console.error(chalk.red(`Failed to send notification ${record.id}: ${reason}`));
			return 1;
		}
		if (record.parts.length === 0) {
			console.log("No drift detected; notification suppressed");
		} else {
			console.log(
				chalk.green(`Notification sent (${record.parts.length} part(s), id ${record.id})`),
			);
		}
		return 0;
	} catch (err) {
		if (err instanceof ReportNotFoundError || err instanceof ValidationError) {
			logger.error({ error: err.message }, "notify command failed");
			console.error(chalk.red(`Error: ${err.message}`));
			return 1;
		}
		const formatted = formatErrorSafe(err);
		logger.error({ error: formatted }, "notify command failed");
		console.error(chalk.red(`Error: ${formatted}`));
		return 1;
	}
}

function printDryRun(
	config: NotificationConfig,
	driftDetected: boolean,
	compose: () => ReturnType<typeof composeNotification>,
): void {
	if (!driftDetected && !config.notifyOnNoDrift) {
		console.log("No drift detected; notification would be suppressed");
		return;
	}
	const parts = compose();
	for (const part of parts) {
		console.log(
			chalk.bold(`--- Part ${part.partNumber}/${part.totalParts} (${part.content.length} chars) ---`),
		);
		console.log(part.content);
	}
	console.log(chalk.dim(`Dry run: ${parts.length} part(s) to ${config.channelId}, nothing sent`));
}

export function registerNotifyCommand(program: Command): void {
	program
		.command("notify", { isDefault: true })
		.description("Send a drift report to the configured Telegram channel")
		.requiredOption("-r, --report <path>", "Path to the drift report JSON file")
		.option("-e, --environment <name>", "Override the report's environment name")
		.option("--run-id <id>", "Run id used in the notification id")
		.option("--dry-run", "Print the message parts instead of sending them")
		.action(async (opts: NotifyOptions) => {
			process.exitCode = await runNotifyCommand(opts);
		});
}
