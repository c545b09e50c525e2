import fs from "node:fs";
import path from "node:path";

import JSON5 from "json5";
import { type ZodError, z } from "zod";

import { ValidationError } from "../errors.js";
import { MIN_MESSAGE_LENGTH, TELEGRAM_API_CHAR_LIMIT } from "../telegram/constants.js";
import { CONFIG_DIR, maskSecret } from "../utils.js";

const MAX_RETRIES_LIMIT = 5;

const TelegramConfigSchema = z.object({
	// Prefer TELEGRAM_BOT_TOKEN in CI; the file is for local runs.
	botToken: z.string().optional(),
	// Numeric chat ids are accepted as JSON numbers too.
	channelId: z
		.union([z.string(), z.number().int()])
		.transform((value) => String(value))
		.optional(),
	requestTimeoutSeconds: z.number().int().positive().default(30),
});

const RetryConfigSchema = z.object({
	maxRetries: z.number().int().min(1).max(MAX_RETRIES_LIMIT).default(3),
	initialDelaySeconds: z.number().positive().default(2),
	multiplier: z.number().min(1).default(2),
	maxDelaySeconds: z.number().positive().default(8),
});

const MessageConfigSchema = z.object({
	markdown: z.boolean().default(true),
	maxMessageLength: z
		.number()
		.int()
		.min(MIN_MESSAGE_LENGTH)
		.max(TELEGRAM_API_CHAR_LIMIT)
		.default(TELEGRAM_API_CHAR_LIMIT),
	includeRunLink: z.boolean().default(true),
});

const NotifyConfigSchema = z.object({
	notifyOnNoDrift: z.boolean().default(false),
	// Deadline for one whole notification (all parts, all retries).
	deadlineSeconds: z.number().positive().optional(),
});

const LoggingConfigSchema = z.object({
	level: z.enum(["silent", "fatal", "error", "warn", "info", "debug", "trace"]).optional(),
	file: z.string().optional(),
});

const DriftNotifyConfigSchema = z.object({
	telegram: TelegramConfigSchema.optional(),
	retry: RetryConfigSchema.optional(),
	message: MessageConfigSchema.optional(),
	notify: NotifyConfigSchema.optional(),
	logging: LoggingConfigSchema.optional(),
});

export type DriftNotifyConfig = z.infer<typeof DriftNotifyConfigSchema>;
/** Config file shape before schema defaults are applied. */
export type DriftNotifyConfigInput = z.input<typeof DriftNotifyConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

/**
 * Telegram channel ids are `@username`, a negative group/channel id, or a numeric chat id.
 */
export function isValidChannelId(value: string): boolean {
	return value.startsWith("@") || value.startsWith("-") || /^\d+$/.test(value);
}

/**
 * The validated value object the notifier runs on.
 * Durations are in milliseconds.
 */
const NotificationConfigSchema = z.object({
	botToken: z
		.string({ required_error: "bot token is required (TELEGRAM_BOT_TOKEN or telegram.botToken)" })
		.min(20, "bot token must be at least 20 characters")
		.refine((token) => token.includes(":"), "bot token must contain ':' separator"),
	channelId: z
		.string({
			required_error: "channel id is required (TELEGRAM_CHANNEL_ID or telegram.channelId)",
		})
		.min(1, "channel id cannot be empty")
		.refine(isValidChannelId, "channel id must start with '@' or '-', or be numeric"),
	maxRetries: z.number().int().min(1).max(MAX_RETRIES_LIMIT),
	initialDelayMs: z.number().int().positive(),
	multiplier: z.number().min(1),
	maxDelayMs: z.number().int().positive(),
	markdown: z.boolean(),
	maxMessageLength: z.number().int().min(MIN_MESSAGE_LENGTH).max(TELEGRAM_API_CHAR_LIMIT),
	includeRunLink: z.boolean(),
	notifyOnNoDrift: z.boolean(),
	requestTimeoutSeconds: z.number().int().positive(),
	deadlineMs: z.number().int().positive().optional(),
});

export type NotificationConfig = z.infer<typeof NotificationConfigSchema>;

export type ConfigValidationResult =
	| { ok: true; config: NotificationConfig }
	| { ok: false; issues: string[] };

const EnvOverridesSchema = z.object({
	TELEGRAM_BOT_TOKEN: z.string().optional(),
	TELEGRAM_CHANNEL_ID: z.string().optional(),
	TELEGRAM_MAX_RETRIES: z.coerce.number().int().optional(),
	TELEGRAM_NOTIFY_NO_DRIFT: z
		.string()
		.transform((value) => value.trim().toLowerCase() === "true")
		.optional(),
});

const ENV_KEYS = [
	"TELEGRAM_BOT_TOKEN",
	"TELEGRAM_CHANNEL_ID",
	"TELEGRAM_MAX_RETRIES",
	"TELEGRAM_NOTIFY_NO_DRIFT",
] as const;

function formatIssues(error: ZodError): string[] {
	return error.issues.map((issue) =>
		issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
	);
}

/**
 * Validate a candidate notification config. Each invariant is checked once, here.
 */
export function validateNotificationConfig(input: unknown): ConfigValidationResult {
	const result = NotificationConfigSchema.safeParse(input);
	if (!result.success) {
		return { ok: false, issues: formatIssues(result.error) };
	}
	return { ok: true, config: result.data };
}

/**
 * Merge the config file with environment overrides and validate the result.
 * Environment variables win over file values; empty variables count as unset.
 */
export function resolveNotificationConfig(
	fileConfig: DriftNotifyConfigInput,
	env: NodeJS.ProcessEnv = process.env,
): ConfigValidationResult {
	const present: Record<string, string> = {};
	for (const key of ENV_KEYS) {
		const value = env[key];
		if (value !== undefined && value.trim() !== "") {
			present[key] = value;
		}
	}

	const envResult = EnvOverridesSchema.safeParse(present);
	if (!envResult.success) {
		return { ok: false, issues: formatIssues(envResult.error) };
	}
	const overrides = envResult.data;

	const telegram = TelegramConfigSchema.parse(fileConfig.telegram ?? {});
	const retry = RetryConfigSchema.parse(fileConfig.retry ?? {});
	const message = MessageConfigSchema.parse(fileConfig.message ?? {});
	const notify = NotifyConfigSchema.parse(fileConfig.notify ?? {});

	return validateNotificationConfig({
		botToken: overrides.TELEGRAM_BOT_TOKEN ?? telegram.botToken,
		channelId: overrides.TELEGRAM_CHANNEL_ID ?? telegram.channelId,
		maxRetries: overrides.TELEGRAM_MAX_RETRIES ?? retry.maxRetries,
		initialDelayMs: Math.round(retry.initialDelaySeconds * 1000),
		multiplier: retry.multiplier,
		maxDelayMs: Math.round(retry.maxDelaySeconds * 1000),
		markdown: message.markdown,
		maxMessageLength: message.maxMessageLength,
		includeRunLink: message.includeRunLink,
		notifyOnNoDrift: overrides.TELEGRAM_NOTIFY_NO_DRIFT ?? notify.notifyOnNoDrift,
		requestTimeoutSeconds: telegram.requestTimeoutSeconds,
		deadlineMs:
			notify.deadlineSeconds !== undefined ? Math.round(notify.deadlineSeconds * 1000) : undefined,
	});
}

const CONFIG_FILE_NAME = "drift-notify.json";

let configPathFlag: string | undefined;

/**
 * Record the `--config` flag. It wins over DRIFT_NOTIFY_CONFIG; undefined clears it.
 */
export function setConfigPath(configPath: string | undefined): void {
	configPathFlag = configPath;
}

/**
 * Where the config file is read from: `--config`, then DRIFT_NOTIFY_CONFIG,
 * then drift-notify.json in the data directory. Relative paths resolve
 * against the working directory.
 */
export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
	const fromEnv = env.DRIFT_NOTIFY_CONFIG?.trim();
	return path.resolve(configPathFlag ?? (fromEnv || path.join(CONFIG_DIR, CONFIG_FILE_NAME)));
}

let cachedConfig: DriftNotifyConfig | null = null;
let configMtime: number | null = null;
let cachedConfigPath: string | null = null;

/**
 * Load and parse the configuration file found by getConfigPath().
 * A missing file yields an empty config (all defaults).
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DriftNotifyConfig {
	const configPath = getConfigPath(env);

	let stat: fs.Stats;
	try {
		stat = fs.statSync(configPath);
	} catch (err) {
		const code = err instanceof Error && "code" in err ? err.code : undefined;
		if (code === "ENOENT") {
			return {};
		}
		throw err;
	}

	if (cachedConfig && cachedConfigPath === configPath && configMtime === stat.mtimeMs) {
		return cachedConfig;
	}

	const raw = fs.readFileSync(configPath, "utf-8");
	let parsed: unknown;
	try {
		parsed = JSON5.parse(raw);
	} catch (err) {
		throw new ValidationError(`Config file ${configPath} is not valid JSON5`, [
			err instanceof Error ? err.message : String(err),
		]);
	}

	const result = DriftNotifyConfigSchema.safeParse(parsed);
	if (!result.success) {
		throw new ValidationError(`Invalid configuration in ${configPath}`, formatIssues(result.error));
	}

	cachedConfig = result.data;
	configMtime = stat.mtimeMs;
	cachedConfigPath = configPath;

	return result.data;
}

/**
 * Load the config file, apply environment overrides and validate.
 * Throws ValidationError with every failed invariant.
 */
export function loadNotificationConfig(env: NodeJS.ProcessEnv = process.env): NotificationConfig {
	const result = resolveNotificationConfig(loadConfig(env), env);
	if (!result.ok) {
		throw new ValidationError("Invalid configuration", result.issues);
	}
	return result.config;
}

/**
 * Config summary safe to log: the bot token keeps only its first and last 4 characters.
 */
export function sanitizeConfigForLogging(config: NotificationConfig): Record<string, unknown> {
	return {
		botToken: maskSecret(config.botToken),
		channelId: config.channelId,
		maxRetries: config.maxRetries,
		initialDelayMs: config.initialDelayMs,
		multiplier: config.multiplier,
		maxDelayMs: config.maxDelayMs,
		markdown: config.markdown,
		maxMessageLength: config.maxMessageLength,
		notifyOnNoDrift: config.notifyOnNoDrift,
	};
}

/**
 * Reset the config cache (useful for testing).
 */
export function resetConfigCache() {
	cachedConfig = null;
	configMtime = null;
	cachedConfigPath = null;
}
