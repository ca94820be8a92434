import { EOL } from "node:os";
import { describe, expect, test } from "vitest";
import { LogLevel } from "../levels/index.js";
import { LogRecord, renderRecord } from "../record/index.js";
import { joinEntries, renderBatch } from "./batch.js";
import { LOG_END_BYTES, LOG_START_BYTES } from "./format.js";

function createRecord(number: number, group?: string): LogRecord {
	return new LogRecord({
		number,
		logTime: "2026-10-19T12:00:00.000000",
		message: `message ${number}`,
		level: LogLevel.Warning,
		group,
		stacktrace: "",
	});
}

describe("file markers", () => {
	test("use the native line ending", () => {
		expect(LOG_START_BYTES.toString("utf8")).toBe(
			`<?xml version="1.0" encoding="utf-8"?>${EOL}<LogFile>${EOL}`,
		);
		expect(LOG_END_BYTES.toString("utf8")).toBe(`${EOL}</LogFile>`);
	});
});

describe("joinEntries", () => {
	test("separates entries with a blank line", () => {
		const joined = joinEntries([Buffer.from("a"), Buffer.from("b")]);
		expect(joined.toString("utf8")).toBe(`a${EOL}${EOL}b`);
	});

	test("returns an empty buffer for no entries", () => {
		expect(joinEntries([]).length).toBe(0);
	});
});

describe("renderBatch", () => {
	const writeTime = "2026-10-19T12:00:05.000000";

	test("renders every record into the chronological stream in order", () => {
		const first = createRecord(1, "A");
		const second = createRecord(2, "B");
		const batch = renderBatch([first, second], { writeTime });

		expect(batch.chronological?.entries).toHaveLength(2);
		expect(batch.chronological?.bytes.toString("utf8")).toBe(
			joinEntries([
				renderRecord(first, writeTime),
				renderRecord(second, writeTime),
			]).toString("utf8"),
		);
	});

	test("splits records by group", () => {
		const batch = renderBatch(
			[createRecord(1, "A"), createRecord(2, "B"), createRecord(3, "A"), createRecord(4)],
			{ writeTime },
		);

		expect([...batch.groups.keys()]).toEqual(["A", "B", "None"]);
		expect(batch.groups.get("A")?.entries).toHaveLength(2);
		expect(batch.groups.get("A")?.bytes.toString("utf8")).toContain('Number="3"');
		expect(batch.groups.get("B")?.bytes.toString("utf8")).not.toContain('Number="1"');
	});

	test("omits disabled views", () => {
		const batch = renderBatch([createRecord(1, "A")], {
			chronological: false,
			groups: true,
		});
		expect(batch.chronological).toBeNull();
		expect(batch.groups.size).toBe(1);

		const chronologicalOnly = renderBatch([createRecord(1, "A")], { groups: false });
		expect(chronologicalOnly.groups.size).toBe(0);
		expect(chronologicalOnly.chronological).not.toBeNull();
	});

	test("returns no streams for an empty batch", () => {
		const batch = renderBatch([]);
		expect(batch.chronological).toBeNull();
		expect(batch.groups.size).toBe(0);
	});
});
