export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/** `pretty` writes colored console lines, `json` one JSON object per line. */
export type LogFormat = "pretty" | "json";

export const LOG_FORMATS: readonly LogFormat[] = ["pretty", "json"];

export interface TrackerLogger {
	info(message: string, data?: Record<string, unknown>): void;
	warn(message: string, data?: Record<string, unknown>): void;
	error(message: string, data?: Record<string, unknown>): void;
	debug(message: string, data?: Record<string, unknown>): void;
}

/** Connection settings for a tracker. */
export interface TrackerConfig {
	/** Collector endpoint events are POSTed to (e.g. "https://api.example.com/track") */
	apiUrl: string;
	clientId: string;
	clientSecret: string;
}
