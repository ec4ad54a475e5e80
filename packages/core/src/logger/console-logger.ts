// =============================================================================
// CONSOLE LOGGER — Built-in TrackerLogger backed by console.*
// =============================================================================

import pc from "picocolors";
import type { LogLevel, TrackerLogger } from "../types/config.js";
import { buildRedactKeys, redactData } from "./redact.js";

export const LEVEL_PRIORITY: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

export interface ConsoleLoggerOptions {
	/** Minimum log level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Prefix shown before each message. Default: `"Trackline"` */
	prefix?: string;
	/** Whether to include ISO timestamps. Default: `true` */
	timestamps?: boolean;
	/** Colorize output. Default: whatever picocolors detects for the terminal */
	colors?: boolean;
	/** Keys to redact from log data. Values replaced with "[REDACTED]". Default: credentials and PII keys */
	redactKeys?: string[];
}

/**
 * Create a console-based logger implementing `TrackerLogger`.
 *
 * @example
 * ```ts
 * import { createConsoleLogger } from "@trackline/core";
 *
 * const logger = createConsoleLogger({ level: "debug" });
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): TrackerLogger {
	const { level = "info", prefix = "Trackline", timestamps = true } = options;
	const minPriority = LEVEL_PRIORITY[level];
	const redactKeys = buildRedactKeys(options.redactKeys);
	const c = pc.createColors(options.colors ?? pc.isColorSupported);

	const levelColor: Record<LogLevel, (s: string) => string> = {
		debug: c.magenta,
		info: c.blue,
		warn: c.yellow,
		error: c.red,
	};

	function emit(lvl: LogLevel, message: string, data?: Record<string, unknown>) {
		if (LEVEL_PRIORITY[lvl] < minPriority) return;

		const parts: string[] = [];
		if (timestamps) {
			parts.push(c.dim(new Date().toISOString()));
		}
		parts.push(levelColor[lvl](c.bold(lvl.toUpperCase().padEnd(5))));
		parts.push(`[${prefix}]:`);
		parts.push(message);

		const line = parts.join(" ");
		const method = lvl === "error" ? "error" : lvl === "warn" ? "warn" : "log";

		const safeData = redactData(data, redactKeys);
		if (safeData && Object.keys(safeData).length > 0) {
			console[method](line, safeData);
		} else {
			console[method](line);
		}
	}

	return {
		debug: (message, data) => emit("debug", message, data),
		info: (message, data) => emit("info", message, data),
		warn: (message, data) => emit("warn", message, data),
		error: (message, data) => emit("error", message, data),
	};
}

/** A logger that discards everything. */
export function createSilentLogger(): TrackerLogger {
	const noop = () => {};
	return { debug: noop, info: noop, warn: noop, error: noop };
}
