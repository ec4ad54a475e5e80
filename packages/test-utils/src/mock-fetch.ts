// =============================================================================
// MOCK FETCH — In-process transport double that records every request
// =============================================================================

export interface RecordedRequest {
	url: string;
	method: string;
	headers: Record<string, string>;
	body: string | undefined;
}

export type MockFetchHandler = (request: RecordedRequest) => Response | Promise<Response>;

export interface MockFetch {
	/** Pass as the tracker's `fetch` option. */
	fetch: typeof globalThis.fetch;
	/** Requests in the order they were made. */
	calls: RecordedRequest[];
	/** Parsed JSON body of the request at `index` (default: the last one). */
	jsonBody(index?: number): unknown;
}

/** A response with a JSON body. */
export function jsonResponse(body: unknown, status = 200): Response {
	return new Response(JSON.stringify(body), {
		status,
		headers: { "Content-Type": "application/json" },
	});
}

/** A response whose body is sent verbatim. */
export function textResponse(body: string, status = 200): Response {
	return new Response(body, { status });
}

function toUrl(input: string | URL | Request): string {
	if (typeof input === "string") return input;
	if (input instanceof URL) return input.href;
	return input.url;
}

/**
 * Create a fetch double. Every request is recorded, then answered by
 * `handler` (default: an empty 200). A handler that throws simulates a
 * transport failure.
 *
 * @example
 * ```ts
 * const mock = createMockFetch();
 * const tracker = Tracker.create({ ...config, fetch: mock.fetch });
 * await tracker.track("signup");
 * expect(mock.calls).toHaveLength(1);
 * ```
 */
export function createMockFetch(handler?: MockFetchHandler): MockFetch {
	const calls: RecordedRequest[] = [];

	const fetch: typeof globalThis.fetch = async (input, init) => {
		const headers: Record<string, string> = {};
		new Headers(init?.headers).forEach((value, name) => {
			headers[name] = value;
		});

		const request: RecordedRequest = {
			url: toUrl(input),
			method: init?.method ?? "GET",
			headers,
			body: typeof init?.body === "string" ? init.body : undefined,
		};
		calls.push(request);

		return handler ? handler(request) : new Response(null, { status: 200 });
	};

	return {
		fetch,
		calls,
		jsonBody(index = calls.length - 1) {
			const body = calls[index]?.body;
			if (body === undefined) {
				throw new Error(`No request body recorded at index ${index}`);
			}
			return JSON.parse(body);
		},
	};
}
