import path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import {
	cleanupTestDir,
	createTempDir,
	readTestFile,
	writeTestFile,
} from "../testing/index.js";
import {
	getFileSizeSync,
	overwriteTailSync,
	readHeadSync,
	readTailSync,
	writeBinaryFileSync,
	writeTextFileIfMissingSync,
} from "./index.js";

describe("byte-range helpers", () => {
	let tempDir: string;
	let filePath: string;

	beforeEach(() => {
		tempDir = createTempDir("fs-test-");
		filePath = path.join(tempDir, "file.txt");
		writeTestFile(tempDir, "file.txt", "<start>body</end>");
	});

	afterEach(() => {
		cleanupTestDir(tempDir);
	});

	test("readHeadSync reads the first bytes", () => {
		expect(readHeadSync(filePath, 7).toString("utf8")).toBe("<start>");
	});

	test("readTailSync reads the last bytes", () => {
		expect(readTailSync(filePath, 6).toString("utf8")).toBe("</end>");
	});

	test("reads are clipped to the file length", () => {
		expect(readHeadSync(filePath, 100).toString("utf8")).toBe("<start>body</end>");
		expect(readTailSync(filePath, 100).toString("utf8")).toBe("<start>body</end>");
	});

	test("overwriteTailSync splices before the tail", () => {
		const size = overwriteTailSync(
			filePath,
			6,
			Buffer.from("+more"),
			Buffer.from("</end>"),
		);

		expect(readTestFile(tempDir, "file.txt")).toBe("<start>body+more</end>");
		expect(size).toBe(getFileSizeSync(filePath));
	});

	test("overwriteTailSync truncates when the replacement is shorter", () => {
		overwriteTailSync(filePath, 10, Buffer.from("!"));

		expect(readTestFile(tempDir, "file.txt")).toBe("<start>!");
	});
});

describe("whole-file helpers", () => {
	let tempDir: string;

	beforeEach(() => {
		tempDir = createTempDir("fs-test-");
	});

	afterEach(() => {
		cleanupTestDir(tempDir);
	});

	test("writeBinaryFileSync concatenates chunks", () => {
		writeBinaryFileSync(
			path.join(tempDir, "out.bin"),
			Buffer.from("ab"),
			Buffer.from("cd"),
		);

		expect(readTestFile(tempDir, "out.bin")).toBe("abcd");
	});

	test("writeTextFileIfMissingSync never overwrites", () => {
		const filePath = path.join(tempDir, "once.txt");

		expect(writeTextFileIfMissingSync(filePath, "first")).toBe(true);
		expect(writeTextFileIfMissingSync(filePath, "second")).toBe(false);
		expect(readTestFile(tempDir, "once.txt")).toBe("first");
	});
});
