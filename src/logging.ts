import fs from "node:fs";
import path from "node:path";

import pino, { type Bindings, type LevelWithSilent, type Logger } from "pino";
import { type LoggingConfig, loadConfig } from "./config/config.js";
import { ValidationError } from "./errors.js";
import { isVerbose } from "./globals.js";

const ALLOWED_LEVELS: readonly LevelWithSilent[] = [
	"silent",
	"fatal",
	"error",
	"warn",
	"info",
	"debug",
	"trace",
];

export type LoggerSettings = {
	level?: LevelWithSilent;
	/** Log file. Unset means stdout, which is what CI job logs capture. */
	file?: string;
};

type ResolvedSettings = {
	level: LevelWithSilent;
	file: string | null;
};
export type LoggerResolvedSettings = ResolvedSettings;

type Destination = ReturnType<typeof pino.destination>;

let cachedLogger: Logger | null = null;
let cachedSettings: ResolvedSettings | null = null;
let cachedDestination: Destination | null = null;
let overrideSettings: LoggerSettings | null = null;

const LEVEL_NAMES: ReadonlySet<string> = new Set(ALLOWED_LEVELS);

function isLevel(value: string): value is LevelWithSilent {
	return LEVEL_NAMES.has(value);
}

function normalizeLevel(level?: string): LevelWithSilent {
	if (isVerbose()) return "debug";
	const candidate = level ?? "info";
	return isLevel(candidate) ? candidate : "info";
}

function readLoggingConfig(): LoggingConfig | undefined {
	try {
		return loadConfig().logging;
	} catch (err) {
		// The command that loads the config reports the problem.
		if (err instanceof ValidationError) return undefined;
		throw err;
	}
}

function resolveSettings(): ResolvedSettings {
	const cfg: LoggingConfig | undefined = overrideSettings ?? readLoggingConfig();
	const level = normalizeLevel(cfg?.level);
	const file = cfg?.file ?? null;
	return { level, file };
}

function settingsChanged(a: ResolvedSettings | null, b: ResolvedSettings) {
	if (!a) return true;
	return a.level !== b.level || a.file !== b.file;
}

function closeDestination(dest: Destination): void {
	try {
		dest.flushSync();
	} catch {
		// best-effort: nothing buffered or stream already closed
	}
	// stdout must stay open for the rest of the process
	if (dest.fd !== 1) {
		dest.end();
	}
}

function buildLogger(settings: ResolvedSettings): { logger: Logger; destination: Destination } {
	let destination: Destination;
	if (settings.file) {
		fs.mkdirSync(path.dirname(settings.file), { recursive: true, mode: 0o700 });
		destination = pino.destination({
			dest: settings.file,
			mkdir: true,
			sync: true, // deterministic for tests; log volume is modest.
		});
	} else {
		destination = pino.destination({ dest: 1, sync: true });
	}

	const logger = pino(
		{
			level: settings.level,
			base: undefined,
			timestamp: pino.stdTimeFunctions.isoTime,
			redact: {
				paths: ["botToken", "token", "*.botToken"],
				censor: "[REDACTED]",
			},
		},
		destination,
	);
	return { logger, destination };
}

export function getLogger(): Logger {
	const settings = resolveSettings();
	if (!cachedLogger || settingsChanged(cachedSettings, settings)) {
		if (cachedDestination) {
			closeDestination(cachedDestination);
			cachedDestination = null;
		}
		const built = buildLogger(settings);
		cachedLogger = built.logger;
		cachedDestination = built.destination;
		cachedSettings = settings;
	}
	return cachedLogger;
}

export function getChildLogger(bindings?: Bindings, opts?: { level?: LevelWithSilent }): Logger {
	return getLogger().child(bindings ?? {}, opts);
}

export function getResolvedLoggerSettings(): LoggerResolvedSettings {
	return resolveSettings();
}

// Test helpers
export function setLoggerOverride(settings: LoggerSettings | null) {
	overrideSettings = settings;
	cachedLogger = null;
	cachedSettings = null;
}

export function closeLogger(): void {
	if (cachedDestination) {
		closeDestination(cachedDestination);
		cachedDestination = null;
	}
	cachedLogger = null;
	cachedSettings = null;
}
