#!/usr/bin/env node

import { createProgram } from "./cli/program.js";
import { registerCheckCommand } from "./commands/check.js";
import { registerNotifyCommand } from "./commands/notify.js";
import { setConfigPath } from "./config/config.js";
import { setVerbose } from "./globals.js";
import { formatErrorSafe } from "./infra/network-errors.js";
import { installUnhandledRejectionHandler } from "./infra/unhandled-rejections.js";
import { closeLogger, getLogger } from "./logging.js";

const program = createProgram();

registerNotifyCommand(program);
registerCheckCommand(program);

// Global options must be applied before any config loading happens
program.hook("preAction", (thisCommand) => {
	const opts = thisCommand.opts<{ config?: string; verbose?: boolean }>();
	if (opts.config) {
		setConfigPath(opts.config);
	}
	if (opts.verbose) {
		setVerbose(true);
	}
	// Initialize logger after config path is set
	getLogger();
	installUnhandledRejectionHandler();
});

async function main(): Promise<void> {
	await program.parseAsync();
}

main()
	.catch((err: unknown) => {
		console.error(`Error: ${formatErrorSafe(err)}`);
		process.exitCode = 1;
	})
	.finally(() => {
		closeLogger();
	});
