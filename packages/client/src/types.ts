// =============================================================================
// CLIENT SDK TYPES
// =============================================================================

import type { LogFormat, LogLevel, TrackerConfig, TrackerLogger } from "@trackline/core";

export interface TrackerOptions extends TrackerConfig {
	/** Custom fetch implementation (default: globalThis.fetch) */
	fetch?: typeof globalThis.fetch;

	/** Logger for request diagnostics (default: console logger at `info`) */
	logger?: TrackerLogger;
}

export interface LoadConfigOptions {
	/** Variables to read before the env file (default: process.env) */
	env?: Record<string, string | undefined>;

	/**
	 * Path of a dotenv file to read missing variables from.
	 * Default: `.env` in the working directory, ignored when absent.
	 * `false` skips the file entirely.
	 */
	envFile?: string | false;
}

export interface ResolvedTrackerConfig extends TrackerConfig {
	/** Set by `TRACKLINE_DISABLED=1` or `DO_NOT_TRACK=1` */
	disabled: boolean;
	/** Set by `TRACKLINE_LOG_LEVEL` */
	logLevel?: LogLevel;
	/** Set by `TRACKLINE_LOG_FORMAT` */
	logFormat?: LogFormat;
}

export interface FromEnvOptions extends LoadConfigOptions {
	fetch?: typeof globalThis.fetch;
	logger?: TrackerLogger;
}
