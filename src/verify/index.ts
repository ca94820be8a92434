/**
 * Log file integrity verification.
 *
 * A log file is intact when it begins with the start marker and ends with
 * the end marker. Splicing relies on the end marker sitting exactly at the
 * tail, so every append to an existing file is preceded by this check.
 *
 * @module verify
 */

import { LogIntegrityError } from "../errors/index.js";
import { readHeadSync, readTailSync } from "../fs/index.js";
import { LOG_END_BYTES, LOG_START_BYTES } from "../serializer/index.js";

/**
 * Expected marker bytes. Defaults to the shared log file markers.
 */
export interface LogFileMarkers {
	start: Uint8Array;
	end: Uint8Array;
}

const DEFAULT_MARKERS: LogFileMarkers = {
	start: LOG_START_BYTES,
	end: LOG_END_BYTES,
};

/**
 * Verify that a log file starts and ends with the expected markers.
 *
 * @throws LogIntegrityError naming the mismatched end
 * @throws Error from the filesystem when the file cannot be read
 */
export function verifyLogFile(
	filePath: string,
	markers: LogFileMarkers = DEFAULT_MARKERS,
): void {
	const head = readHeadSync(filePath, markers.start.length);
	if (!head.equals(markers.start)) {
		throw new LogIntegrityError(filePath, "start");
	}

	const tail = readTailSync(filePath, markers.end.length);
	if (!tail.equals(markers.end)) {
		throw new LogIntegrityError(filePath, "end");
	}
}

/**
 * Boolean form of {@link verifyLogFile}. Unreadable files are not intact.
 */
export function isLogFileIntact(
	filePath: string,
	markers: LogFileMarkers = DEFAULT_MARKERS,
): boolean {
	try {
		verifyLogFile(filePath, markers);
		return true;
	} catch {
		return false;
	}
}
