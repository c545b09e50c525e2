import chalk from "chalk";
import type { Command } from "commander";

import {
	type NotificationConfig,
	getConfigPath,
	loadNotificationConfig,
	sanitizeConfigForLogging,
} from "../config/config.js";
import { ValidationError } from "../errors.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";
import { type BotIdentity, formatBotInfo } from "../telegram/transport.js";
import { createTelegramTransport } from "./notify.js";

export type CheckDeps = {
	env?: NodeJS.ProcessEnv;
	createVerifier?: (config: NotificationConfig) => { verify(): Promise<BotIdentity> };
};

/**
 * Validate the configuration and confirm the bot token with getMe.
 */
export async function runCheckCommand(deps: CheckDeps = {}): Promise<number> {
	const logger = getChildLogger({ module: "cmd-check" });
	console.log(`Config file: ${getConfigPath(deps.env)}`);

	let config: NotificationConfig;
	try {
		config = loadNotificationConfig(deps.env);
	} catch (err) {
		if (!(err instanceof ValidationError)) throw err;
		console.error(chalk.red("Configuration is invalid:"));
		for (const issue of err.issues) {
			console.error(`  - ${issue}`);
		}
		return 1;
	}

	for (const [key, value] of Object.entries(sanitizeConfigForLogging(config))) {
		console.log(`  ${key}: ${String(value)}`);
	}

	try {
		const verifier = (deps.createVerifier ?? createTelegramTransport)(config);
		const bot = await verifier.verify();
		console.log(chalk.green(formatBotInfo(bot)));
		return 0;
	} catch (err) {
		const formatted = formatErrorSafe(err);
		logger.error({ error: formatted }, "bot token check failed");
		console.error(chalk.red(`Token check failed: ${formatted}`));
		return 1;
	}
}

export function registerCheckCommand(program: Command): void {
	program
		.command("check")
		.description("Validate configuration and confirm the bot token")
		.action(async () => {
			process.exitCode = await runCheckCommand();
		});
}
