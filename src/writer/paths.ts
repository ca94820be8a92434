/**
 * On-disk layout of a logging root.
 *
 * ```
 * <root>/Latest.xml
 * <root>/<directory>/Session.txt
 * <root>/<directory>/Mods Directory.txt
 * <root>/<directory>/Log.xml
 * <root>/<directory>/Groups/<group>.xml
 * ```
 *
 * @module writer/paths
 */

import path from "node:path";
import { toUniqueSafeFilename } from "../validation/index.js";

export const LATEST_FILE_NAME = "Latest.xml";
export const CHRONOLOGICAL_FILE_NAME = "Log.xml";
export const SESSION_FILE_NAME = "Session.txt";
export const MODS_FILE_NAME = "Mods Directory.txt";
export const GROUPS_DIRECTORY_NAME = "Groups";
export const LOG_FILE_EXTENSION = ".xml";

/**
 * Resolved paths for one log directory.
 */
export interface LogDirectoryPaths {
	readonly directory: string;
	readonly chronological: string;
	readonly latest: string;
	readonly session: string;
	readonly mods: string;
	readonly groups: string;
}

/**
 * Resolve every path used when writing into `directoryName` under `rootPath`.
 */
export function resolveLogDirectoryPaths(
	rootPath: string,
	directoryName: string,
): LogDirectoryPaths {
	const directory = path.join(rootPath, directoryName);
	return {
		directory,
		chronological: path.join(directory, CHRONOLOGICAL_FILE_NAME),
		latest: path.join(rootPath, LATEST_FILE_NAME),
		session: path.join(directory, SESSION_FILE_NAME),
		mods: path.join(directory, MODS_FILE_NAME),
		groups: path.join(directory, GROUPS_DIRECTORY_NAME),
	};
}

/**
 * Path of the file holding one group's records.
 */
export function resolveGroupFilePath(
	paths: LogDirectoryPaths,
	group: string,
): string {
	return path.join(paths.groups, `${toUniqueSafeFilename(group)}${LOG_FILE_EXTENSION}`);
}
