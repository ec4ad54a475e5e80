// =============================================================================
// CONFIG — Load tracker settings from the environment and a dotenv file
// =============================================================================

import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import {
	LOG_FORMATS,
	LOG_LEVELS,
	type LogFormat,
	type LogLevel,
	type TrackerConfig,
	TrackerError,
} from "@trackline/core";
import { parse } from "dotenv";
import type { LoadConfigOptions, ResolvedTrackerConfig } from "./types.js";

export const ENV_VARS = {
	TRACK_URL: "TRACKLINE_TRACK_URL",
	CLIENT_ID: "TRACKLINE_CLIENT_ID",
	CLIENT_SECRET: "TRACKLINE_CLIENT_SECRET",
	DISABLED: "TRACKLINE_DISABLED",
	LOG_LEVEL: "TRACKLINE_LOG_LEVEL",
	LOG_FORMAT: "TRACKLINE_LOG_FORMAT",
} as const;

const DEFAULT_ENV_FILE = ".env";

function isMissingFile(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function readEnvFile(envFile: string | false | undefined): Record<string, string> {
	if (envFile === false) return {};

	const path = resolve(envFile ?? DEFAULT_ENV_FILE);
	let raw: string;
	try {
		raw = readFileSync(path, "utf-8");
	} catch (error) {
		// Only the implicit .env is optional
		if (envFile === undefined && isMissingFile(error)) return {};
		throw TrackerError.configuration(`Unable to read env file ${path}`, error);
	}
	return parse(raw);
}

/**
 * Validate tracker connection settings.
 * Throws a `CONFIGURATION` TrackerError naming the offending field.
 */
export function validateTrackerConfig(config: TrackerConfig): void {
	for (const key of ["apiUrl", "clientId", "clientSecret"] as const) {
		const value: unknown = config[key];
		if (typeof value !== "string" || value.length === 0) {
			throw TrackerError.configuration(`Tracker config: '${key}' is required`);
		}
	}

	try {
		new URL(config.apiUrl);
	} catch (error) {
		throw TrackerError.configuration(`Tracker config: invalid 'apiUrl' "${config.apiUrl}"`, error);
	}
}

function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}

function isLogFormat(value: string): value is LogFormat {
	return LOG_FORMATS.some((format) => format === value);
}

/**
 * Resolve tracker configuration.
 *
 * Variables set in `env` take precedence over the dotenv file.
 *
 * @example
 * ```ts
 * // TRACKLINE_TRACK_URL=https://api.example.com/track
 * // TRACKLINE_CLIENT_ID=...
 * // TRACKLINE_CLIENT_SECRET=...
 * const config = loadTrackerConfig();
 * ```
 */
export function loadTrackerConfig(options: LoadConfigOptions = {}): ResolvedTrackerConfig {
	const env = options.env ?? process.env;
	const fileValues = readEnvFile(options.envFile);

	const lookup = (name: string): string | undefined => env[name] ?? fileValues[name];

	const required = (name: string): string => {
		const value = lookup(name);
		if (value === undefined || value.length === 0) {
			throw TrackerError.configuration(`Missing required environment variable ${name}`);
		}
		return value;
	};

	const config: TrackerConfig = {
		apiUrl: required(ENV_VARS.TRACK_URL),
		clientId: required(ENV_VARS.CLIENT_ID),
		clientSecret: required(ENV_VARS.CLIENT_SECRET),
	};
	validateTrackerConfig(config);

	const logLevel = lookup(ENV_VARS.LOG_LEVEL);
	if (logLevel !== undefined && !isLogLevel(logLevel)) {
		throw TrackerError.configuration(
			`${ENV_VARS.LOG_LEVEL} must be one of ${LOG_LEVELS.join(", ")}, got "${logLevel}"`,
		);
	}

	const logFormat = lookup(ENV_VARS.LOG_FORMAT);
	if (logFormat !== undefined && !isLogFormat(logFormat)) {
		throw TrackerError.configuration(
			`${ENV_VARS.LOG_FORMAT} must be one of ${LOG_FORMATS.join(", ")}, got "${logFormat}"`,
		);
	}

	const disabled = lookup(ENV_VARS.DISABLED) === "1" || lookup("DO_NOT_TRACK") === "1";

	return { ...config, disabled, logLevel, logFormat };
}
