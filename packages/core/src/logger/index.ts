export {
	type ConsoleLoggerOptions,
	createConsoleLogger,
	createSilentLogger,
	LEVEL_PRIORITY,
} from "./console-logger.js";
export { createJsonLogger, type JsonLoggerOptions } from "./json-logger.js";
export { buildRedactKeys, redactData } from "./redact.js";
