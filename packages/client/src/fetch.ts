// =============================================================================
// FETCH TRANSPORT — Single-shot POST/GET against the collector
// =============================================================================

import { type TrackerLogger, TrackerError } from "@trackline/core";

export interface FetchTransport {
	post(url: string, body: string): Promise<Response>;
	get(url: string): Promise<Response>;
}

export interface FetchTransportOptions {
	headers: Headers;
	fetch?: typeof globalThis.fetch;
	logger: TrackerLogger;
}

/**
 * Wrap a fetch implementation. Transport failures become `REQUEST` errors;
 * responses are returned untouched whatever their status.
 */
export function createFetchTransport(options: FetchTransportOptions): FetchTransport {
	const fetchFn = options.fetch ?? globalThis.fetch;
	const { logger } = options;

	async function request(method: "GET" | "POST", url: string, body?: string): Promise<Response> {
		const init: RequestInit = {
			method,
			headers: new Headers(options.headers),
		};
		if (body !== undefined) {
			init.body = body;
		}

		logger.debug("Sending request", { method, url });

		try {
			return await fetchFn(url, init);
		} catch (error) {
			logger.warn("Request failed", { method, url, error });
			throw TrackerError.request(`${method} ${url} failed`, error);
		}
	}

	return {
		post: (url, body) => request("POST", url, body),
		get: (url) => request("GET", url),
	};
}
