/**
 * Test fixtures for the logging engine.
 *
 * Provides temp directories, fixture files, and a readable view of the
 * log files a test produced.
 *
 * @example
 * ```ts
 * import { createTempDir, readTestFile, cleanupTestDir } from "../testing/index.js";
 *
 * const root = createTempDir("engine-");
 * // ... run a logger against root ...
 * const latest = readTestFile(root, "Latest.xml");
 * cleanupTestDir(root);
 * ```
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";

/**
 * Create a temporary directory with a given prefix
 *
 * @param prefix - Prefix for the temp directory name (default: "test-")
 * @returns Absolute path to the created temp directory
 */
export function createTempDir(prefix = "test-"): string {
	return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/**
 * Write a test file to a directory, creating parent directories as needed
 */
export function writeTestFile(
	dir: string,
	relativePath: string,
	content: string | Uint8Array,
): void {
	const fullPath = path.join(dir, relativePath);
	fs.mkdirSync(path.dirname(fullPath), { recursive: true });
	fs.writeFileSync(fullPath, content);
}

/**
 * Read a test file from a directory as UTF-8 text
 */
export function readTestFile(dir: string, relativePath: string): string {
	return fs.readFileSync(path.join(dir, relativePath), "utf8");
}

/**
 * Check if a test file exists
 */
export function testFileExists(dir: string, relativePath: string): boolean {
	return fs.existsSync(path.join(dir, relativePath));
}

/**
 * List the entries of a directory inside the fixture, sorted
 */
export function listTestDir(dir: string, relativePath = "."): string[] {
	return fs.readdirSync(path.join(dir, relativePath)).sort();
}

/**
 * Remove a test directory and all its contents
 */
export function cleanupTestDir(dir: string): void {
	fs.rmSync(dir, { recursive: true, force: true });
}
