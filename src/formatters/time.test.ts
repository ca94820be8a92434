import { describe, expect, test } from "vitest";
import {
	formatDirectoryName,
	formatLogTimestamp,
	parseDirectoryName,
} from "./time.js";

describe("formatLogTimestamp", () => {
	test("formats local time with microseconds", () => {
		const date = new Date(2026, 9, 19, 14, 30, 5, 42);
		expect(formatLogTimestamp(date)).toBe("2026-10-19T14:30:05.042000");
	});

	test("pads single digit fields", () => {
		const date = new Date(2024, 0, 2, 3, 4, 5, 6);
		expect(formatLogTimestamp(date)).toBe("2024-01-02T03:04:05.006000");
	});
});

describe("formatDirectoryName", () => {
	test("uses dots between time fields", () => {
		const date = new Date(2026, 9, 19, 14, 30, 5, 42);
		expect(formatDirectoryName(date)).toBe("2026-10-19 14.30.05.042000");
	});
});

describe("parseDirectoryName", () => {
	test("parses a formatted name", () => {
		const date = new Date(2026, 9, 19, 14, 30, 5, 42);
		expect(parseDirectoryName(formatDirectoryName(date))?.getTime()).toBe(
			date.getTime(),
		);
	});

	test("rejects names that do not follow the convention", () => {
		expect(parseDirectoryName("Groups")).toBeNull();
		expect(parseDirectoryName("2026-10-19 14:30:05.042000")).toBeNull();
		expect(parseDirectoryName("2026-10-19 14.30.05")).toBeNull();
	});

	test("rejects impossible dates", () => {
		expect(parseDirectoryName("2026-13-01 00.00.00.000000")).toBeNull();
		expect(parseDirectoryName("2026-02-30 00.00.00.000000")).toBeNull();
	});
});
