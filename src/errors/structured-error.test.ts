import { describe, expect, test } from "vitest";
import {
	isRecoverableError,
	isStructuredError,
	LogInputError,
	LogIntegrityError,
	StructuredError,
	toError,
} from "./structured-error.js";

describe("StructuredError", () => {
	test("creates error with all properties", () => {
		const error = new StructuredError(
			"Unknown log level",
			"CONFIGURATION",
			"UNKNOWN_LOG_LEVEL",
			false,
			{ value: "Loud" },
		);

		expect(error).toBeInstanceOf(Error);
		expect(error.message).toBe("Unknown log level");
		expect(error.category).toBe("CONFIGURATION");
		expect(error.code).toBe("UNKNOWN_LOG_LEVEL");
		expect(error.recoverable).toBe(false);
		expect(error.context).toEqual({ value: "Loud" });
		expect(error.name).toBe("StructuredError");
		expect(error.stack).toBeDefined();
	});

	test("serializes cause to JSON", () => {
		const original = new Error("disk full");
		const error = new StructuredError(
			"Write failed",
			"IO",
			"WRITE_FAILED",
			true,
			{},
			original,
		);

		expect(error.toJSON()).toMatchObject({
			name: "StructuredError",
			code: "WRITE_FAILED",
			recoverable: true,
			cause: { name: "Error", message: "disk full" },
		});
	});
});

describe("LogIntegrityError", () => {
	test("names the mismatched start", () => {
		const error = new LogIntegrityError("/logs/Log.xml", "start");

		expect(error.message).toBe(
			"The start of the log file doesn't match what was expected.",
		);
		expect(error.code).toBe("LOG_START_MISMATCH");
		expect(error.end).toBe("start");
		expect(error.context).toEqual({ filePath: "/logs/Log.xml" });
		expect(isRecoverableError(error)).toBe(true);
	});

	test("names the mismatched end", () => {
		const error = new LogIntegrityError("/logs/Log.xml", "end");

		expect(error.code).toBe("LOG_END_MISMATCH");
		expect(error.name).toBe("LogIntegrityError");
	});
});

describe("LogInputError", () => {
	test("describes the offending argument", () => {
		const error = new LogInputError("group", "a string", 42);

		expect(error.message).toBe("Expected 'group' to be a string, got number.");
		expect(error.recoverable).toBe(false);
		expect(isStructuredError(error)).toBe(true);
	});
});

describe("toError", () => {
	test("passes errors through", () => {
		const error = new Error("x");
		expect(toError(error)).toBe(error);
	});

	test("wraps other values", () => {
		expect(toError("boom").message).toBe("boom");
	});
});
