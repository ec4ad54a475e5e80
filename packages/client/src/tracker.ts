// =============================================================================
// TRACKER — Builder-style client for the collector API
// =============================================================================

import {
	createConsoleLogger,
	createJsonLogger,
	EVENT_KINDS,
	type Envelope,
	type IdentifyUser,
	type Properties,
	type PropertyFilter,
	type TrackerConfig,
	TrackerError,
	type TrackerLogger,
} from "@trackline/core";
import { loadTrackerConfig, validateTrackerConfig } from "./config.js";
import {
	createCounterEnvelope,
	createIdentifyEnvelope,
	createRevenueEnvelope,
	createTrackEnvelope,
	mergeProperties,
	serializeEnvelope,
} from "./envelope.js";
import { createFetchTransport } from "./fetch.js";
import { headersToObject, setHeader, withDefaultHeaders } from "./headers.js";
import type { FromEnvOptions, TrackerOptions } from "./types.js";

const DEVICE_ID_PATH = "/device-id";

interface TrackerState {
	config: TrackerConfig;
	headers: Headers;
	globalProperties: Properties;
	disabled: boolean;
	fetch?: typeof globalThis.fetch;
	logger: TrackerLogger;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Client for sending events to the collector.
 *
 * Every `with*` method returns a new Tracker and leaves the receiver
 * unchanged, so a configured tracker can be shared freely.
 *
 * @example
 * ```ts
 * const tracker = Tracker.fromEnv()
 *   .withDefaultHeaders()
 *   .withGlobalProperties({ app: "checkout" });
 *
 * await tracker.track("signup", { plan: "pro" });
 *
 * // Skip delivery when the merged properties match
 * await tracker.track("signup", { plan: "pro" }, (props) => props.plan === "internal");
 * ```
 */
export class Tracker {
	private readonly state: TrackerState;

	private constructor(state: TrackerState) {
		this.state = state;
	}

	static create(options: TrackerOptions): Tracker {
		const config: TrackerConfig = {
			apiUrl: options.apiUrl,
			clientId: options.clientId,
			clientSecret: options.clientSecret,
		};
		validateTrackerConfig(config);

		return new Tracker({
			config,
			headers: new Headers(),
			globalProperties: {},
			disabled: false,
			fetch: options.fetch,
			logger: options.logger ?? createConsoleLogger(),
		});
	}

	/**
	 * Create a tracker from `TRACKLINE_*` variables (and `.env`).
	 * Starts disabled when `TRACKLINE_DISABLED=1` or `DO_NOT_TRACK=1`.
	 * Without an explicit `logger`, `TRACKLINE_LOG_FORMAT=json` selects the JSON logger.
	 */
	static fromEnv(options: FromEnvOptions = {}): Tracker {
		const { disabled, logLevel, logFormat, ...config } = loadTrackerConfig(options);
		const logger =
			options.logger ??
			(logFormat === "json"
				? createJsonLogger({ level: logLevel })
				: createConsoleLogger({ level: logLevel }));

		const tracker = Tracker.create({ ...config, fetch: options.fetch, logger });
		return disabled ? tracker.disable() : tracker;
	}

	get apiUrl(): string {
		return this.state.config.apiUrl;
	}

	get clientId(): string {
		return this.state.config.clientId;
	}

	get headers(): Record<string, string> {
		return headersToObject(this.state.headers);
	}

	get globalProperties(): Properties {
		return { ...this.state.globalProperties };
	}

	get disabled(): boolean {
		return this.state.disabled;
	}

	private with(patch: Partial<TrackerState>): Tracker {
		return new Tracker({ ...this.state, ...patch });
	}

	/** Set Content-Type and the client credential headers. */
	withDefaultHeaders(): Tracker {
		return this.with({ headers: withDefaultHeaders(this.state.headers, this.state.config) });
	}

	/** Set a custom header, e.g. a user agent or forwarded IP for geo location. */
	withHeader(name: string, value: string): Tracker {
		return this.with({ headers: setHeader(this.state.headers, name, value) });
	}

	/**
	 * Replace the global properties. They are added to every `track`,
	 * `revenue` and `identify` call and win over per-call values.
	 */
	withGlobalProperties(properties: Properties): Tracker {
		return this.with({ globalProperties: { ...properties } });
	}

	/** Stop sending events; every request fails with `DISABLED`. */
	disable(): Tracker {
		return this.with({ disabled: true });
	}

	/**
	 * Track an event.
	 *
	 * @param filter - Evaluated against the merged properties; returning
	 *   `true` rejects with `FILTERED` and nothing is sent.
	 */
	async track(
		name: string,
		properties?: Properties,
		filter?: PropertyFilter,
		profileId?: string,
	): Promise<Response> {
		const merged = mergeProperties(properties, this.state.globalProperties);

		if (filter?.({ ...merged })) {
			this.state.logger.debug("Event filtered", { event: name });
			throw TrackerError.filtered();
		}

		return this.send(createTrackEnvelope(name, merged, profileId));
	}

	async identify(user: IdentifyUser): Promise<Response> {
		return this.send(createIdentifyEnvelope(user, this.state.globalProperties));
	}

	async increment(profileId: string, property: string, value: number): Promise<Response> {
		return this.send(createCounterEnvelope(EVENT_KINDS.INCREMENT, profileId, property, value));
	}

	async decrement(profileId: string, property: string, value: number): Promise<Response> {
		return this.send(createCounterEnvelope(EVENT_KINDS.DECREMENT, profileId, property, value));
	}

	async revenue(amount: number, properties?: Properties, profileId?: string): Promise<Response> {
		const merged = mergeProperties(properties, this.state.globalProperties);
		return this.send(createRevenueEnvelope(amount, merged, profileId));
	}

	/**
	 * Ask the collector for the device id it derives from the request
	 * headers. Resolves to "" when the response carries none.
	 */
	async fetchDeviceId(): Promise<string> {
		this.assertEnabled();

		const url = `${this.state.config.apiUrl.replace(/\/+$/, "")}${DEVICE_ID_PATH}`;
		const response = await this.transport().get(url);

		let body: string;
		try {
			body = await response.text();
		} catch (error) {
			throw TrackerError.request(`Unable to read response from ${url}`, error);
		}

		let json: unknown;
		try {
			json = JSON.parse(body);
		} catch (error) {
			throw TrackerError.serialization("Device id response is not valid JSON", error);
		}

		if (!isRecord(json)) {
			throw TrackerError.serialization("Device id response is not a JSON object");
		}

		const deviceId = json.deviceId;
		if (deviceId === undefined) return "";
		if (typeof deviceId !== "string") {
			throw TrackerError.serialization("Device id response field 'deviceId' is not a string");
		}
		return deviceId;
	}

	private assertEnabled(): void {
		if (this.state.disabled) {
			throw TrackerError.disabled();
		}
	}

	private transport() {
		return createFetchTransport({
			headers: this.state.headers,
			fetch: this.state.fetch,
			logger: this.state.logger,
		});
	}

	private async send(envelope: Envelope): Promise<Response> {
		this.assertEnabled();

		const body = serializeEnvelope(envelope);
		this.state.logger.debug("Sending payload", { type: envelope.type, payload: envelope.payload });

		return this.transport().post(this.state.config.apiUrl, body);
	}
}
