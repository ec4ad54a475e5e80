export { ENV_VARS, loadTrackerConfig, validateTrackerConfig } from "./config.js";
export {
	createCounterEnvelope,
	createIdentifyEnvelope,
	createRevenueEnvelope,
	createTrackEnvelope,
	mergeProperties,
	serializeEnvelope,
} from "./envelope.js";
export { ensureOk, errorFromResponse } from "./error.js";
export { createFetchTransport, type FetchTransport, type FetchTransportOptions } from "./fetch.js";
export { CLIENT_ID_HEADER, CLIENT_SECRET_HEADER } from "./headers.js";
export { Tracker } from "./tracker.js";
export type {
	FromEnvOptions,
	LoadConfigOptions,
	ResolvedTrackerConfig,
	TrackerOptions,
} from "./types.js";

export type {
	Envelope,
	EventKind,
	IdentifyUser,
	Properties,
	PropertyFilter,
	TrackerErrorCode,
	TrackerLogger,
} from "@trackline/core";
export {
	createConsoleLogger,
	createJsonLogger,
	createSilentLogger,
	isTrackerError,
	TrackerError,
} from "@trackline/core";
