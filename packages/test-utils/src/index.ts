export {
	createMockFetch,
	jsonResponse,
	type MockFetch,
	type MockFetchHandler,
	type RecordedRequest,
	textResponse,
} from "./mock-fetch.js";
