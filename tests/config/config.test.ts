import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
	type NotificationConfig,
	getConfigPath,
	isValidChannelId,
	loadConfig,
	loadNotificationConfig,
	resetConfigCache,
	resolveNotificationConfig,
	sanitizeConfigForLogging,
	setConfigPath,
	validateNotificationConfig,
} from "../../src/config/config.js";
import { ValidationError } from "../../src/errors.js";
import { CONFIG_DIR } from "../../src/utils.js";

const TOKEN = "123456:test-secret-token-value";

const valid: NotificationConfig = {
	botToken: TOKEN,
	channelId: "@drift-alerts",
	maxRetries: 3,
	initialDelayMs: 2000,
	multiplier: 2,
	maxDelayMs: 8000,
	markdown: true,
	maxMessageLength: 4096,
	includeRunLink: true,
	notifyOnNoDrift: false,
	requestTimeoutSeconds: 30,
};

function issuesOf(input: unknown): string[] {
	const result = validateNotificationConfig(input);
	return result.ok ? [] : result.issues;
}

describe("config/validateNotificationConfig", () => {
	it("accepts a valid config", () => {
		expect(validateNotificationConfig(valid)).toEqual({ ok: true, config: valid });
	});

	it("requires a bot token", () => {
		expect(issuesOf({ ...valid, botToken: undefined })).toEqual([
			"botToken: bot token is required (TELEGRAM_BOT_TOKEN or telegram.botToken)",
		]);
	});

	it("checks the token shape", () => {
		expect(issuesOf({ ...valid, botToken: "abc:def" })).toEqual([
			"botToken: bot token must be at least 20 characters",
		]);
		expect(issuesOf({ ...valid, botToken: "x".repeat(25) })).toEqual([
			"botToken: bot token must contain ':' separator",
		]);
	});

	it("checks the channel id", () => {
		expect(isValidChannelId("@drift-alerts")).toBe(true);
		expect(isValidChannelId("-1001234567890")).toBe(true);
		expect(isValidChannelId("123456")).toBe(true);
		expect(isValidChannelId("drift-alerts")).toBe(false);
		expect(issuesOf({ ...valid, channelId: "drift-alerts" })).toEqual([
			"channelId: channel id must start with '@' or '-', or be numeric",
		]);
	});

	it("bounds retries and message length", () => {
		expect(validateNotificationConfig({ ...valid, maxRetries: 0 }).ok).toBe(false);
		expect(validateNotificationConfig({ ...valid, maxRetries: 6 }).ok).toBe(false);
		expect(validateNotificationConfig({ ...valid, maxRetries: 5 }).ok).toBe(true);
		expect(validateNotificationConfig({ ...valid, maxMessageLength: 100 }).ok).toBe(false);
		expect(validateNotificationConfig({ ...valid, maxMessageLength: 4097 }).ok).toBe(false);
	});

	it("reports every failed invariant at once", () => {
		expect(issuesOf({ ...valid, botToken: "short", channelId: "nope" })).toHaveLength(3);
	});
});

describe("config/resolveNotificationConfig", () => {
	const file = { telegram: { botToken: TOKEN, channelId: "@drift-alerts" } };

	it("fills defaults from the schema", () => {
		const result = resolveNotificationConfig(file, {});
		expect(result).toEqual({ ok: true, config: valid });
	});

	it("converts seconds to milliseconds", () => {
		const result = resolveNotificationConfig(
			{
				...file,
				retry: { maxRetries: 2, initialDelaySeconds: 0.5, multiplier: 3, maxDelaySeconds: 4 },
				notify: { notifyOnNoDrift: false, deadlineSeconds: 90 },
			},
			{},
		);
		expect(result.ok && result.config).toMatchObject({
			maxRetries: 2,
			initialDelayMs: 500,
			multiplier: 3,
			maxDelayMs: 4000,
			deadlineMs: 90_000,
		});
	});

	it("lets environment variables win over the file", () => {
		const result = resolveNotificationConfig(file, {
			TELEGRAM_BOT_TOKEN: "654321:test-secret-other-token",
			TELEGRAM_CHANNEL_ID: "-1001234567890",
			TELEGRAM_MAX_RETRIES: "5",
			TELEGRAM_NOTIFY_NO_DRIFT: "TRUE",
		});
		expect(result.ok && result.config).toMatchObject({
			botToken: "654321:test-secret-other-token",
			channelId: "-1001234567890",
			maxRetries: 5,
			notifyOnNoDrift: true,
		});
	});

	it("treats empty variables as unset", () => {
		const result = resolveNotificationConfig(file, { TELEGRAM_CHANNEL_ID: "", TELEGRAM_BOT_TOKEN: " " });
		expect(result.ok && result.config).toMatchObject({ botToken: TOKEN, channelId: "@drift-alerts" });
	});

	it("reads anything but 'true' as false for the no-drift flag", () => {
		const result = resolveNotificationConfig(
			{ ...file, notify: { notifyOnNoDrift: true } },
			{ TELEGRAM_NOTIFY_NO_DRIFT: "yes" },
		);
		expect(result.ok && result.config.notifyOnNoDrift).toBe(false);
	});

	it("rejects a non-numeric retry override", () => {
		const result = resolveNotificationConfig(file, { TELEGRAM_MAX_RETRIES: "many" });
		expect(result.ok).toBe(false);
		expect(result.ok ? [] : result.issues[0]).toMatch(/^TELEGRAM_MAX_RETRIES: /);
	});

	it("rejects an out-of-range retry override", () => {
		expect(resolveNotificationConfig(file, { TELEGRAM_MAX_RETRIES: "9" }).ok).toBe(false);
	});

	it("reports missing credentials", () => {
		const result = resolveNotificationConfig({}, {});
		expect(result.ok ? [] : result.issues).toEqual([
			"botToken: bot token is required (TELEGRAM_BOT_TOKEN or telegram.botToken)",
			"channelId: channel id is required (TELEGRAM_CHANNEL_ID or telegram.channelId)",
		]);
	});
});

describe("config/getConfigPath", () => {
	afterEach(() => {
		setConfigPath(undefined);
	});

	it("prefers the --config flag over DRIFT_NOTIFY_CONFIG", () => {
		setConfigPath("/etc/drift/flag.json");
		expect(getConfigPath({ DRIFT_NOTIFY_CONFIG: "/etc/drift/env.json" })).toBe(
			"/etc/drift/flag.json",
		);
	});

	it("falls back to DRIFT_NOTIFY_CONFIG", () => {
		expect(getConfigPath({ DRIFT_NOTIFY_CONFIG: "/etc/drift/env.json" })).toBe(
			"/etc/drift/env.json",
		);
	});

	it("ignores a blank DRIFT_NOTIFY_CONFIG and uses the data directory", () => {
		expect(getConfigPath({ DRIFT_NOTIFY_CONFIG: "  " })).toBe(
			path.resolve(CONFIG_DIR, "drift-notify.json"),
		);
	});

	it("resolves a relative path against the working directory", () => {
		expect(getConfigPath({ DRIFT_NOTIFY_CONFIG: "ci/drift-notify.json" })).toBe(
			path.join(process.cwd(), "ci", "drift-notify.json"),
		);
	});

	it("reads the file named by DRIFT_NOTIFY_CONFIG", () => {
		const dir = fs.mkdtempSync(path.join(os.tmpdir(), "drift-config-env-"));
		const configPath = path.join(dir, "ci.json5");
		fs.writeFileSync(configPath, `{ telegram: { channelId: "@from-env" } }`);
		resetConfigCache();
		try {
			expect(loadConfig({ DRIFT_NOTIFY_CONFIG: configPath }).telegram?.channelId).toBe(
				"@from-env",
			);
		} finally {
			resetConfigCache();
			fs.rmSync(dir, { recursive: true, force: true });
		}
	});
});

describe("config/loadConfig", () => {
	let dir: string;
	let configPath: string;

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "drift-config-"));
		configPath = path.join(dir, "drift-notify.json");
		setConfigPath(configPath);
		resetConfigCache();
	});

	afterEach(() => {
		setConfigPath(undefined);
		resetConfigCache();
		fs.rmSync(dir, { recursive: true, force: true });
	});

	it("returns an empty config when the file is missing", () => {
		expect(loadConfig()).toEqual({});
	});

	it("parses JSON5 and accepts numeric channel ids", () => {
		fs.writeFileSync(
			configPath,
			`{
				// CI channel
				telegram: { botToken: "${TOKEN}", channelId: -1001234567890 },
				retry: { maxRetries: 2 },
			}`,
		);

		expect(loadConfig().telegram?.channelId).toBe("-1001234567890");

		const config = loadNotificationConfig({});
		expect(config.channelId).toBe("-1001234567890");
		expect(config.maxRetries).toBe(2);
		expect(config.initialDelayMs).toBe(2000);
	});

	it("throws ValidationError for malformed JSON5", () => {
		fs.writeFileSync(configPath, "{ telegram: ");
		expect(() => loadConfig()).toThrow(ValidationError);
	});

	it("throws ValidationError for schema violations", () => {
		fs.writeFileSync(configPath, JSON.stringify({ retry: { maxRetries: 9 } }));
		expect(() => loadConfig()).toThrow(
			"retry.maxRetries: Number must be less than or equal to 5",
		);
	});

	it("loadNotificationConfig throws with every issue", () => {
		try {
			loadNotificationConfig({});
			expect.unreachable("expected a ValidationError");
		} catch (err) {
			expect(err).toBeInstanceOf(ValidationError);
			expect(err instanceof ValidationError && err.issues).toHaveLength(2);
		}
	});
});

describe("config/sanitizeConfigForLogging", () => {
	it("masks the bot token", () => {
		const sanitized = sanitizeConfigForLogging(valid);
		expect(sanitized.botToken).toBe("1234...alue");
		expect(sanitized.channelId).toBe("@drift-alerts");
	});

	it("fully redacts short tokens", () => {
		expect(sanitizeConfigForLogging({ ...valid, botToken: "12345:abcde" }).botToken).toBe(
			"[REDACTED]",
		);
	});
});
