export type { LogFormat, LogLevel, TrackerConfig, TrackerLogger } from "./config.js";
export { LOG_FORMATS, LOG_LEVELS } from "./config.js";
export type {
	CounterEnvelope,
	CounterKind,
	CounterPayload,
	Envelope,
	EventKind,
	IdentifyEnvelope,
	IdentifyPayload,
	IdentifyUser,
	Properties,
	PropertyFilter,
	RevenuePayload,
	TrackEnvelope,
	TrackPayload,
} from "./event.js";
export { EVENT_KINDS, REVENUE_EVENT_NAME } from "./event.js";
