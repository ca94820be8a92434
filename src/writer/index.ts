/**
 * Log directory writing.
 *
 * @module writer
 */

export {
	CHRONOLOGICAL_FILE_NAME,
	GROUPS_DIRECTORY_NAME,
	LATEST_FILE_NAME,
	LOG_FILE_EXTENSION,
	type LogDirectoryPaths,
	MODS_FILE_NAME,
	resolveGroupFilePath,
	resolveLogDirectoryPaths,
	SESSION_FILE_NAME,
} from "./paths.js";
export {
	fitPayload,
	LogFileWriter,
	type LogWriter,
	type WriteOutcome,
	type WriteRequest,
} from "./writer.js";
