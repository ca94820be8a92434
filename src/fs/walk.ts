/**
 * Directory walking utilities for recursive file traversal.
 *
 * @module fs/walk
 */

import { readdirSync, statSync } from "node:fs";
import path from "node:path";
import { isDirectorySync, isFileSync, readDir } from "./index.js";

/**
 * Options for directory walking.
 */
export interface WalkDirectoryOptions {
	/**
	 * Directory names to skip during traversal.
	 */
	readonly skipDirs?: ReadonlyArray<string>;

	/**
	 * Directory paths whose whole subtree is skipped. Compared after
	 * `path.resolve`, so relative and absolute forms both work.
	 */
	readonly skipPaths?: ReadonlyArray<string>;

	/**
	 * Whether to skip hidden files/directories (starting with ".").
	 * Defaults to false.
	 */
	readonly skipHidden?: boolean;

	/**
	 * Called for a directory that could not be read. The walk continues
	 * with the next sibling.
	 */
	readonly onError?: (dirPath: string, error: unknown) => void;
}

/**
 * Callback function invoked for each file found during directory walk.
 *
 * @param fullPath - Path to the file (rooted where the walk started)
 * @param relativePath - Path relative to the root directory
 * @param entry - Filename (basename)
 */
export type FileVisitor = (
	fullPath: string,
	relativePath: string,
	entry: string,
) => void;

function isWithin(candidate: string, parent: string): boolean {
	const relative = path.relative(parent, candidate);
	return (
		relative === "" || (!relative.startsWith("..") && !path.isAbsolute(relative))
	);
}

/**
 * Recursively walks a directory tree and calls a visitor for each file,
 * in sorted order.
 *
 * @example
 * ```typescript
 * const files: string[] = [];
 * walkDirectory("/game/persistent", (fullPath) => files.push(fullPath), {
 *   skipPaths: ["/game/persistent/cache"],
 * });
 * ```
 */
export function walkDirectory(
	rootDir: string,
	onFile: FileVisitor,
	options: WalkDirectoryOptions = {},
): void {
	const { skipDirs = [], skipPaths = [], skipHidden = false, onError } = options;
	const skipDirSet = new Set(skipDirs);
	const skipRoots = skipPaths.map((skipPath) => path.resolve(skipPath));

	function walk(currentDir: string): void {
		if (skipRoots.some((skipRoot) => isWithin(path.resolve(currentDir), skipRoot))) {
			return;
		}

		let entries: string[];
		try {
			entries = readDir(currentDir);
		} catch (error) {
			onError?.(currentDir, error);
			return;
		}

		for (const entry of entries) {
			if (skipHidden && entry.startsWith(".")) continue;

			const fullPath = path.join(currentDir, entry);
			if (isDirectorySync(fullPath)) {
				if (skipDirSet.has(entry)) continue;
				walk(fullPath);
			} else if (isFileSync(fullPath)) {
				onFile(fullPath, path.relative(rootDir, fullPath), entry);
			}
		}
	}

	walk(rootDir);
}

/**
 * A node in a directory listing.
 */
export type DirectoryNode =
	| {
			readonly kind: "directory";
			readonly name: string;
			readonly children: readonly DirectoryNode[];
	  }
	| {
			readonly kind: "file";
			readonly name: string;
			readonly size: number;
	  };

/**
 * Read a directory into a tree: directories first, then files, each group
 * sorted by name. Entries that are neither files nor directories (sockets,
 * dangling links) are left out.
 *
 * @throws Error if any directory in the tree cannot be read
 */
export function readDirectoryTree(dirPath: string): DirectoryNode {
	const entries = readdirSync(dirPath, { withFileTypes: true });

	const directories: DirectoryNode[] = [];
	const files: DirectoryNode[] = [];

	for (const entry of entries) {
		const fullPath = path.join(dirPath, entry.name);
		if (entry.isDirectory()) {
			directories.push(readDirectoryTree(fullPath));
		} else if (entry.isFile()) {
			files.push({ kind: "file", name: entry.name, size: statSync(fullPath).size });
		}
	}

	const byName = (a: DirectoryNode, b: DirectoryNode): number =>
		a.name < b.name ? -1 : a.name > b.name ? 1 : 0;

	return {
		kind: "directory",
		name: path.basename(dirPath),
		children: [...directories.sort(byName), ...files.sort(byName)],
	};
}
