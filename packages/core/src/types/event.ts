// =============================================================================
// WIRE EVENTS — Envelope and payload shapes sent to the collector
// =============================================================================

export const EVENT_KINDS = {
	TRACK: "track",
	IDENTIFY: "identify",
	INCREMENT: "increment",
	DECREMENT: "decrement",
} as const;

export type EventKind = (typeof EVENT_KINDS)[keyof typeof EVENT_KINDS];

export type CounterKind = typeof EVENT_KINDS.INCREMENT | typeof EVENT_KINDS.DECREMENT;

/** Event name reserved for revenue events. */
export const REVENUE_EVENT_NAME = "revenue";

/** String-keyed, string-valued event or profile properties. */
export type Properties = Record<string, string>;

/**
 * Predicate evaluated against the merged properties of a `track` call.
 * Returning `true` vetoes delivery.
 */
export type PropertyFilter = (properties: Properties) => boolean;

export interface TrackPayload {
	name: string;
	profileId?: string;
	properties: Properties;
}

export interface RevenuePayload extends TrackPayload {
	name: typeof REVENUE_EVENT_NAME;
	amount: number;
}

/** User object used for identify calls. */
export interface IdentifyUser {
	profileId: string;
	email?: string;
	firstName?: string;
	lastName?: string;
	properties?: Properties;
}

export interface IdentifyPayload extends IdentifyUser {
	properties: Properties;
}

export interface CounterPayload {
	profileId: string;
	property: string;
	/** Signed delta, sent as given for both increment and decrement. */
	value: number;
}

export type TrackEnvelope = {
	type: typeof EVENT_KINDS.TRACK;
	payload: TrackPayload | RevenuePayload;
};

export type IdentifyEnvelope = {
	type: typeof EVENT_KINDS.IDENTIFY;
	payload: IdentifyPayload;
};

export type CounterEnvelope = {
	type: CounterKind;
	payload: CounterPayload;
};

export type Envelope = TrackEnvelope | IdentifyEnvelope | CounterEnvelope;
