import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { TrackerError } from "@trackline/core";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadTrackerConfig, validateTrackerConfig } from "../config.js";

const baseEnv = {
	TRACKLINE_TRACK_URL: "https://collector.test/track",
	TRACKLINE_CLIENT_ID: "test-client",
	TRACKLINE_CLIENT_SECRET: "test-secret",
};

function thrown(fn: () => unknown): unknown {
	try {
		fn();
	} catch (error) {
		return error;
	}
	throw new Error("expected function to throw");
}

describe("loadTrackerConfig", () => {
	it("reads the three required variables", () => {
		expect(loadTrackerConfig({ env: baseEnv, envFile: false })).toEqual({
			apiUrl: "https://collector.test/track",
			clientId: "test-client",
			clientSecret: "test-secret",
			disabled: false,
		});
	});

	it("names the missing variable", () => {
		const { TRACKLINE_CLIENT_SECRET: _secret, ...env } = baseEnv;
		const error = thrown(() => loadTrackerConfig({ env, envFile: false }));

		expect(error).toBeInstanceOf(TrackerError);
		expect(error).toMatchObject({
			code: "CONFIGURATION",
			message: "Missing required environment variable TRACKLINE_CLIENT_SECRET",
		});
	});

	it("treats an empty value as missing", () => {
		const error = thrown(() =>
			loadTrackerConfig({ env: { ...baseEnv, TRACKLINE_CLIENT_ID: "" }, envFile: false }),
		);
		expect(error).toMatchObject({
			code: "CONFIGURATION",
			message: "Missing required environment variable TRACKLINE_CLIENT_ID",
		});
	});

	it("rejects an endpoint that is not a URL", () => {
		const error = thrown(() =>
			loadTrackerConfig({ env: { ...baseEnv, TRACKLINE_TRACK_URL: "not a url" }, envFile: false }),
		);
		expect(error).toMatchObject({
			code: "CONFIGURATION",
			message: `Tracker config: invalid 'apiUrl' "not a url"`,
		});
	});

	it.each([
		{ name: "TRACKLINE_DISABLED", value: "1", disabled: true },
		{ name: "DO_NOT_TRACK", value: "1", disabled: true },
		{ name: "TRACKLINE_DISABLED", value: "0", disabled: false },
	])("$name=$value gives disabled=$disabled", ({ name, value, disabled }) => {
		const config = loadTrackerConfig({ env: { ...baseEnv, [name]: value }, envFile: false });
		expect(config.disabled).toBe(disabled);
	});

	it("reads the log level", () => {
		const config = loadTrackerConfig({
			env: { ...baseEnv, TRACKLINE_LOG_LEVEL: "debug" },
			envFile: false,
		});
		expect(config.logLevel).toBe("debug");
	});

	it("rejects an unknown log level", () => {
		const error = thrown(() =>
			loadTrackerConfig({ env: { ...baseEnv, TRACKLINE_LOG_LEVEL: "verbose" }, envFile: false }),
		);
		expect(error).toMatchObject({
			code: "CONFIGURATION",
			message: 'TRACKLINE_LOG_LEVEL must be one of debug, info, warn, error, got "verbose"',
		});
	});

	it("reads the log format", () => {
		const config = loadTrackerConfig({
			env: { ...baseEnv, TRACKLINE_LOG_FORMAT: "json" },
			envFile: false,
		});
		expect(config.logFormat).toBe("json");
	});

	it("rejects an unknown log format", () => {
		const error = thrown(() =>
			loadTrackerConfig({ env: { ...baseEnv, TRACKLINE_LOG_FORMAT: "xml" }, envFile: false }),
		);
		expect(error).toMatchObject({
			code: "CONFIGURATION",
			message: 'TRACKLINE_LOG_FORMAT must be one of pretty, json, got "xml"',
		});
	});

	describe("env file", () => {
		let dir: string;

		beforeEach(() => {
			dir = mkdtempSync(join(tmpdir(), "trackline-config-"));
		});

		afterEach(() => {
			rmSync(dir, { recursive: true, force: true });
		});

		it("fills in variables missing from the environment", () => {
			const envFile = join(dir, ".env");
			writeFileSync(
				envFile,
				[
					"TRACKLINE_TRACK_URL=https://file.test/track",
					"TRACKLINE_CLIENT_ID=file-client",
					"TRACKLINE_CLIENT_SECRET=file-secret",
				].join("\n"),
			);

			const config = loadTrackerConfig({ env: { TRACKLINE_CLIENT_ID: "env-client" }, envFile });

			expect(config).toEqual({
				apiUrl: "https://file.test/track",
				clientId: "env-client",
				clientSecret: "file-secret",
				disabled: false,
			});
		});

		it("fails when an explicitly named file does not exist", () => {
			const envFile = join(dir, "missing.env");
			const error = thrown(() => loadTrackerConfig({ env: baseEnv, envFile }));

			expect(error).toMatchObject({
				code: "CONFIGURATION",
				message: `Unable to read env file ${envFile}`,
			});
		});
	});
});

describe("validateTrackerConfig", () => {
	it("requires a non-empty endpoint", () => {
		const error = thrown(() =>
			validateTrackerConfig({ apiUrl: "", clientId: "test-client", clientSecret: "test-secret" }),
		);
		expect(error).toMatchObject({
			code: "CONFIGURATION",
			message: "Tracker config: 'apiUrl' is required",
		});
	});
});
