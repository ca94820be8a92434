/**
 * Synchronous filesystem helpers for the log writer.
 *
 * Flushing is synchronous file I/O run to completion, so everything here
 * uses node:fs sync calls. Byte-level helpers read the head or tail of a
 * file and overwrite a file's tail in place, which is how new content is
 * spliced in before a closing marker.
 */

import {
	closeSync,
	copyFileSync as fsCopyFileSync,
	existsSync,
	fstatSync,
	ftruncateSync,
	mkdirSync,
	statSync as nodeStatSync,
	openSync,
	readdirSync,
	readFileSync,
	readSync,
	writeFileSync,
	writeSync,
} from "node:fs";
import path from "node:path";

// ============================================
// PATH QUERIES
// ============================================

/**
 * Check if a path exists synchronously.
 */
export function pathExistsSync(filePath: string): boolean {
	return existsSync(filePath);
}

/**
 * Check if path is a directory.
 */
export function isDirectorySync(filePath: string): boolean {
	return existsSync(filePath) && nodeStatSync(filePath).isDirectory();
}

/**
 * Check if path is a file.
 */
export function isFileSync(filePath: string): boolean {
	return existsSync(filePath) && nodeStatSync(filePath).isFile();
}

/**
 * Size of a file in bytes.
 *
 * @throws Error if the file does not exist
 */
export function getFileSizeSync(filePath: string): number {
	return nodeStatSync(filePath).size;
}

/**
 * List entry names in a directory, sorted.
 */
export function readDir(dirPath: string): string[] {
	return readdirSync(dirPath).sort();
}

// ============================================
// WHOLE-FILE OPERATIONS
// ============================================

/**
 * Ensure a directory exists synchronously.
 */
export function ensureDirSync(dirPath: string): void {
	mkdirSync(dirPath, { recursive: true });
}

/**
 * Ensure parent directory exists for a file path.
 */
export function ensureParentDirSync(filePath: string): void {
	mkdirSync(path.dirname(filePath), { recursive: true });
}

/**
 * Read file contents synchronously.
 *
 * @throws Error if file doesn't exist
 */
export function readTextFileSync(filePath: string): string {
	return readFileSync(filePath, "utf8");
}

/**
 * Write text to a file, replacing its contents.
 */
export function writeTextFileSync(filePath: string, content: string): void {
	writeFileSync(filePath, content, "utf8");
}

/**
 * Write text only when the file does not exist yet.
 *
 * @returns true when the file was created
 */
export function writeTextFileIfMissingSync(
	filePath: string,
	content: string,
): boolean {
	if (existsSync(filePath)) {
		return false;
	}
	writeFileSync(filePath, content, "utf8");
	return true;
}

/**
 * Create or replace a file with the concatenation of `chunks`.
 */
export function writeBinaryFileSync(
	filePath: string,
	...chunks: readonly Uint8Array[]
): void {
	writeFileSync(filePath, Buffer.concat(chunks));
}

/**
 * Copy a file synchronously, replacing the destination.
 */
export function copyFileSync(src: string, dest: string): void {
	fsCopyFileSync(src, dest);
}

// ============================================
// BYTE-RANGE OPERATIONS
// ============================================

function readRange(fd: number, position: number, length: number): Buffer {
	const buffer = Buffer.alloc(length);
	let offset = 0;
	while (offset < length) {
		const read = readSync(fd, buffer, offset, length - offset, position + offset);
		if (read === 0) break;
		offset += read;
	}
	return buffer.subarray(0, offset);
}

/**
 * Read up to `length` bytes from the start of a file.
 *
 * @returns Fewer than `length` bytes when the file is shorter
 */
export function readHeadSync(filePath: string, length: number): Buffer {
	const fd = openSync(filePath, "r");
	try {
		return readRange(fd, 0, length);
	} finally {
		closeSync(fd);
	}
}

/**
 * Read up to `length` bytes from the end of a file.
 *
 * @returns Fewer than `length` bytes when the file is shorter
 */
export function readTailSync(filePath: string, length: number): Buffer {
	const fd = openSync(filePath, "r");
	try {
		const size = fstatSync(fd).size;
		const start = Math.max(0, size - length);
		return readRange(fd, start, size - start);
	} finally {
		closeSync(fd);
	}
}

/**
 * Replace the last `tailLength` bytes of a file with `chunks`.
 *
 * Opens the file read-write, writes from `size - tailLength` onwards and
 * truncates anything left past the new end. Everything before the tail is
 * preserved byte for byte.
 *
 * @returns The new file size
 */
export function overwriteTailSync(
	filePath: string,
	tailLength: number,
	...chunks: readonly Uint8Array[]
): number {
	const data = Buffer.concat(chunks);
	const fd = openSync(filePath, "r+");
	try {
		const size = fstatSync(fd).size;
		const position = Math.max(0, size - tailLength);
		let written = 0;
		while (written < data.length) {
			written += writeSync(fd, data, written, data.length - written, position + written);
		}
		const end = position + data.length;
		if (end < size) {
			ftruncateSync(fd, end);
		}
		return end;
	} finally {
		closeSync(fd);
	}
}

// ============================================
// RE-EXPORTS - New utility modules
// ============================================

// Directory walking utilities
export {
	type DirectoryNode,
	type FileVisitor,
	readDirectoryTree,
	type WalkDirectoryOptions,
	walkDirectory,
} from "./walk.js";
