import { describe, expect, it } from "vitest";
import {
	isTrackerError,
	isTrackerErrorCode,
	TRACKER_ERROR_CODES,
	TrackerError,
} from "../error/index.js";

describe("TrackerError", () => {
	describe("constructor", () => {
		it("uses the registry message when none is given", () => {
			const error = new TrackerError("FILTERED");
			expect(error.code).toBe("FILTERED");
			expect(error.message).toBe("Event filtered");
		});

		it("keeps a custom message", () => {
			const error = new TrackerError("REQUEST", "POST https://collector.test failed");
			expect(error.message).toBe("POST https://collector.test failed");
		});

		it("is an instance of Error and TrackerError", () => {
			const error = new TrackerError("INTERNAL");
			expect(error).toBeInstanceOf(Error);
			expect(error).toBeInstanceOf(TrackerError);
		});

		it("has the name 'TrackerError'", () => {
			expect(new TrackerError("HEADER").name).toBe("TrackerError");
		});

		it("attaches the cause", () => {
			const cause = new TypeError("invalid header value");
			const error = new TrackerError("HEADER", undefined, { cause });
			expect(error.cause).toBe(cause);
		});
	});

	describe("expected", () => {
		it.each(["DISABLED", "FILTERED"] as const)("%s is expected", (code) => {
			expect(new TrackerError(code).expected).toBe(true);
		});

		it.each(["CONFIGURATION", "HEADER", "SERIALIZATION", "REQUEST"] as const)(
			"%s is not expected",
			(code) => {
				expect(new TrackerError(code).expected).toBe(false);
			},
		);
	});

	describe("status", () => {
		it("takes the registry status for status-derived codes", () => {
			expect(new TrackerError("TOO_MANY_REQUESTS").status).toBe(429);
		});

		it("prefers an explicit status", () => {
			expect(TrackerError.fromCode("INTERNAL", { status: 503 }).status).toBe(503);
		});

		it("is undefined for local failures", () => {
			expect(TrackerError.request().status).toBeUndefined();
		});
	});

	describe("static factories", () => {
		it.each([
			{ error: TrackerError.disabled(), code: "DISABLED", message: "Tracker is disabled" },
			{ error: TrackerError.filtered(), code: "FILTERED", message: "Event filtered" },
			{
				error: TrackerError.configuration(),
				code: "CONFIGURATION",
				message: "Missing or invalid tracker configuration",
			},
			{ error: TrackerError.header(), code: "HEADER", message: "Invalid header name or value" },
			{
				error: TrackerError.serialization(),
				code: "SERIALIZATION",
				message: "Error serializing payload",
			},
			{ error: TrackerError.request(), code: "REQUEST", message: "Request failed" },
		])("creates $code", ({ error, code, message }) => {
			expect(error.code).toBe(code);
			expect(error.message).toBe(message);
		});

		it("fromCode uses a custom message", () => {
			const error = TrackerError.fromCode("UNEXPECTED_STATUS", { message: "status 404" });
			expect(error.message).toBe("status 404");
		});
	});
});

describe("isTrackerError", () => {
	it("narrows by class", () => {
		expect(isTrackerError(TrackerError.disabled())).toBe(true);
		expect(isTrackerError(new Error("plain"))).toBe(false);
		expect(isTrackerError("DISABLED")).toBe(false);
	});

	it("matches a specific code", () => {
		const error = TrackerError.filtered();
		expect(isTrackerError(error, "FILTERED")).toBe(true);
		expect(isTrackerError(error, "DISABLED")).toBe(false);
	});
});

describe("isTrackerErrorCode", () => {
	it("accepts registry keys only", () => {
		expect(isTrackerErrorCode("REQUEST")).toBe(true);
		expect(isTrackerErrorCode("toString")).toBe(false);
		expect(isTrackerErrorCode("NOT_A_CODE")).toBe(false);
	});

	it("cannot gain codes at runtime", () => {
		expect(Object.isFrozen(TRACKER_ERROR_CODES)).toBe(true);
	});

	it("covers every code in the registry", () => {
		for (const code of Object.keys(TRACKER_ERROR_CODES)) {
			expect(isTrackerErrorCode(code)).toBe(true);
		}
	});
});
