/**
 * Selection of files to attach to a problem report.
 *
 * @module reporting/collect
 */

import path from "node:path";
import type { Logger } from "@logtape/logtape";
import { toError } from "../errors/index.js";
import { parseDirectoryName } from "../formatters/index.js";
import { isDirectorySync, isFileSync, readDir, walkDirectory } from "../fs/index.js";
import { getDiagnosticsLogger } from "../logging/index.js";
import {
	CHRONOLOGICAL_FILE_NAME,
	LATEST_FILE_NAME,
	MODS_FILE_NAME,
	SESSION_FILE_NAME,
} from "../writer/index.js";

/** Most recent log directories included in a report. */
export const MAX_REPORTED_DIRECTORIES = 10;

const REPORTED_DIRECTORY_FILES = [CHRONOLOGICAL_FILE_NAME, SESSION_FILE_NAME, MODS_FILE_NAME];

/**
 * List the log files worth attaching to a report.
 *
 * `Latest.xml` comes first, then the chronological log and snapshots of the
 * ten newest timestamp-named directories, newest first. Directories whose
 * names are not timestamps are skipped.
 */
export function collectLogFilesToReport(
	rootPath: string,
	diagnostics: Logger = getDiagnosticsLogger("reporting"),
): string[] {
	const files: string[] = [];

	const latestPath = path.join(rootPath, LATEST_FILE_NAME);
	if (isFileSync(latestPath)) {
		files.push(latestPath);
	}

	if (!isDirectorySync(rootPath)) {
		return files;
	}

	const directories: { name: string; time: number }[] = [];
	for (const name of readDir(rootPath)) {
		if (!isDirectorySync(path.join(rootPath, name))) continue;

		const time = parseDirectoryName(name);
		if (time === null) {
			diagnostics.warning(
				"Skipping log directory {name}: expected 'Year-Month-Day Hour.Minute.Second.Microsecond'",
				{ name, rootPath },
			);
			continue;
		}
		directories.push({ name, time: time.getTime() });
	}

	directories.sort((a, b) => b.time - a.time || (a.name < b.name ? 1 : a.name > b.name ? -1 : 0));

	for (const { name } of directories.slice(0, MAX_REPORTED_DIRECTORIES)) {
		for (const fileName of REPORTED_DIRECTORY_FILES) {
			const filePath = path.join(rootPath, name, fileName);
			if (isFileSync(filePath)) {
				files.push(filePath);
			}
		}
	}

	return files;
}

/**
 * List every file under a persistent data directory, leaving out the
 * subtrees in `ignoredDirectories`.
 */
export function collectPersistentFiles(
	persistentPath: string,
	ignoredDirectories: readonly string[] = [],
	diagnostics: Logger = getDiagnosticsLogger("reporting"),
): string[] {
	const files: string[] = [];

	walkDirectory(persistentPath, (fullPath) => files.push(fullPath), {
		skipPaths: ignoredDirectories,
		onError: (dirPath, error) => {
			diagnostics.warning("Could not read {dirPath}: {message}", {
				dirPath,
				message: toError(error).message,
			});
		},
	});

	return files;
}
