// =============================================================================
// JSON LOGGER — One JSON object per line, for log shippers
// =============================================================================

import type { LogLevel, TrackerLogger } from "../types/config.js";
import { LEVEL_PRIORITY } from "./console-logger.js";
import { buildRedactKeys, redactData } from "./redact.js";

export interface JsonLoggerOptions {
	/** Minimum log level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Written as `service` on every line. Default: `"trackline"` */
	service?: string;
	/** Keys to redact at any depth of log data. Default: credentials and profile fields */
	redactKeys?: string[];
}

// Causes nested deeper than this are cut off
const MAX_CAUSE_DEPTH = 3;

function serializeError(error: Error, depth = 0): Record<string, unknown> {
	const result: Record<string, unknown> = { name: error.name, message: error.message };
	if ("code" in error && typeof error.code === "string") {
		result.code = error.code;
	}
	if (error.cause !== undefined && depth < MAX_CAUSE_DEPTH) {
		result.cause =
			error.cause instanceof Error ? serializeError(error.cause, depth + 1) : String(error.cause);
	}
	return result;
}

// Error fields are not enumerable, so JSON.stringify would write `{}`
function replaceErrors(_key: string, value: unknown): unknown {
	return value instanceof Error ? serializeError(value) : value;
}

/**
 * Create a `TrackerLogger` that writes each entry as a single JSON line.
 * `Error` values in log data are written as `{ name, message, code?, cause? }`.
 *
 * Selected by `Tracker.fromEnv()` when `TRACKLINE_LOG_FORMAT=json`.
 */
export function createJsonLogger(options: JsonLoggerOptions = {}): TrackerLogger {
	const { level = "info", service = "trackline" } = options;
	const minPriority = LEVEL_PRIORITY[level];
	const redactKeys = buildRedactKeys(options.redactKeys);

	function emit(lvl: LogLevel, message: string, data?: Record<string, unknown>) {
		if (LEVEL_PRIORITY[lvl] < minPriority) return;

		// Fixed fields come last so log data cannot overwrite them
		const entry = {
			...redactData(data, redactKeys),
			timestamp: new Date().toISOString(),
			level: lvl,
			service,
			message,
		};

		const method = lvl === "error" ? "error" : lvl === "warn" ? "warn" : "log";
		console[method](JSON.stringify(entry, replaceErrors));
	}

	return {
		debug: (message, data) => emit("debug", message, data),
		info: (message, data) => emit("info", message, data),
		warn: (message, data) => emit("warn", message, data),
		error: (message, data) => emit("error", message, data),
	};
}
