import fs from "node:fs";

import { Command } from "commander";
import { z } from "zod";

const PackageJsonSchema = z.object({ version: z.string() });

function getVersion(): string {
	try {
		// Resolve package.json relative to this module (works from src or dist)
		const raw = fs.readFileSync(new URL("../../package.json", import.meta.url), "utf-8");
		const pkg = PackageJsonSchema.safeParse(JSON.parse(raw));
		return pkg.success ? pkg.data.version : "0.0.0";
	} catch {
		return "0.0.0";
	}
}

export function createProgram(): Command {
	const program = new Command();

	program
		.name("drift-notify")
		.description("Send infrastructure drift reports to a Telegram channel")
		.version(getVersion())
		.option("-v, --verbose", "Enable verbose output")
		.option("-c, --config <path>", "Path to config file");

	return program;
}
