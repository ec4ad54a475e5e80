// Errors
export type { RawErrorCode, TrackerErrorCode, TrackerErrorOptions } from "./error/index.js";
export {
	isTrackerError,
	isTrackerErrorCode,
	TRACKER_ERROR_CODES,
	TrackerError,
} from "./error/index.js";

// Loggers
export * from "./logger/index.js";

// Type definitions
export * from "./types/index.js";
