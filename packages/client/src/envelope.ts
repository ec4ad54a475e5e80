// =============================================================================
// ENVELOPE — Property merging and typed event envelopes
// =============================================================================

import {
	type CounterEnvelope,
	type CounterKind,
	EVENT_KINDS,
	type Envelope,
	type IdentifyEnvelope,
	type IdentifyUser,
	type Properties,
	REVENUE_EVENT_NAME,
	type TrackEnvelope,
	TrackerError,
} from "@trackline/core";

/**
 * Merge per-call properties with global properties.
 * Globals are applied last, so they win on key collision.
 */
export function mergeProperties(properties: Properties | undefined, globals: Properties): Properties {
	return { ...properties, ...globals };
}

function assertSafeInteger(field: string, value: number): void {
	if (!Number.isSafeInteger(value)) {
		throw TrackerError.serialization(`'${field}' must be a safe integer, got ${value}`);
	}
}

export function createTrackEnvelope(
	name: string,
	properties: Properties,
	profileId?: string,
): TrackEnvelope {
	return {
		type: EVENT_KINDS.TRACK,
		payload: profileId === undefined ? { name, properties } : { name, profileId, properties },
	};
}

/**
 * Revenue is a track event named "revenue". The amount is sent both at the
 * payload's top level and as a decimal string inside the properties.
 */
export function createRevenueEnvelope(
	amount: number,
	properties: Properties,
	profileId?: string,
): TrackEnvelope {
	assertSafeInteger("amount", amount);

	const withAmount: Properties = { ...properties, amount: String(amount) };
	return {
		type: EVENT_KINDS.TRACK,
		payload:
			profileId === undefined
				? { name: REVENUE_EVENT_NAME, amount, properties: withAmount }
				: { name: REVENUE_EVENT_NAME, amount, profileId, properties: withAmount },
	};
}

/** Only `properties` is merged with globals; the other fields pass through. */
export function createIdentifyEnvelope(user: IdentifyUser, globals: Properties): IdentifyEnvelope {
	return {
		type: EVENT_KINDS.IDENTIFY,
		payload: { ...user, properties: mergeProperties(user.properties, globals) },
	};
}

/** `value` is sent as given; a decrement is not negated. */
export function createCounterEnvelope(
	kind: CounterKind,
	profileId: string,
	property: string,
	value: number,
): CounterEnvelope {
	assertSafeInteger("value", value);

	return {
		type: kind,
		payload: { profileId, property, value },
	};
}

export function serializeEnvelope(envelope: Envelope): string {
	try {
		return JSON.stringify(envelope);
	} catch (error) {
		throw TrackerError.serialization(`Error serializing ${envelope.type} payload`, error);
	}
}
