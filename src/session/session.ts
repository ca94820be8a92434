/**
 * Environment snapshots written once into every log directory.
 *
 * @module session/session
 */

import { randomUUID } from "node:crypto";
import os from "node:os";
import path from "node:path";
import type { Logger } from "@logtape/logtape";
import { toError } from "../errors/index.js";
import { formatLogTimestamp } from "../formatters/index.js";
import { type DirectoryNode, readDirectoryTree } from "../fs/index.js";
import { getDiagnosticsLogger } from "../logging/index.js";

export const SESSION_INFORMATION_FAILURE = "Failed to get session information";
export const MODS_INFORMATION_FAILURE = "Failed to get mod information";

/**
 * Identity of one debugging session. Shared by every logger in the process.
 */
export interface DebugSession {
	readonly id: string;
	readonly startTime: Date;
}

/**
 * Start a new debugging session.
 */
export function createDebugSession(startTime: Date = new Date()): DebugSession {
	return { id: randomUUID(), startTime };
}

export interface OperatingSystemDescription {
	readonly type: string;
	readonly version: string;
}

/**
 * Describe the host operating system.
 */
export function describeOperatingSystem(): OperatingSystemDescription {
	return { type: os.type(), version: `${os.version()} (${os.release()})` };
}

export interface SessionInformationInit {
	readonly session: DebugSession;
	/** Whether the directory continues a session after a rotation. */
	readonly isContinuation: boolean;
	/** Content packs the host reports as installed. */
	readonly installedPacks?: readonly string[];
	/** Defaults to the host operating system. */
	readonly describeSystem?: () => OperatingSystemDescription;
}

/**
 * Render `Session.txt`.
 *
 * Never throws. On failure the placeholder text is returned and the cause is
 * reported through diagnostics.
 */
export function createSessionInformation(
	init: SessionInformationInit,
	diagnostics: Logger = getDiagnosticsLogger("session"),
): string {
	try {
		const system = (init.describeSystem ?? describeOperatingSystem)();
		const lines = [
			`Debugging session ID '${init.session.id}'`,
			`Debugging session start time '${formatLogTimestamp(init.session.startTime)}'`,
			`Log is a continuation of another '${init.isContinuation}'`,
			"",
			`Operating system '${system.type}'`,
			`Version '${system.version}'`,
			"",
			"Installed packs:",
			...(init.installedPacks ?? []),
		];
		return lines.join(os.EOL);
	} catch (error) {
		diagnostics.error("Failed to get session information: {message}", {
			message: toError(error).message,
		});
		return SESSION_INFORMATION_FAILURE;
	}
}

function outlineNode(node: DirectoryNode, depth: number): string[] {
	const indent = "\t".repeat(depth);

	if (node.kind === "file") {
		return [`${indent}${node.name} (${node.size} B)`];
	}

	return [
		`${indent}${node.name} {`,
		...node.children.flatMap((child) => outlineNode(child, depth + 1)),
		`${indent}}`,
	];
}

/**
 * Render a directory tree as a bracketed outline.
 *
 * @example
 * ```
 * Mods {
 * 	Scripts {
 * 		loader.ts (120 B)
 * 	}
 * 	readme.txt (14 B)
 * }
 * ```
 */
export function formatDirectoryOutline(tree: DirectoryNode): string {
	return outlineNode(tree, 0).join(os.EOL);
}

/**
 * Render `Mods Directory.txt` for the host's content directory.
 *
 * Never throws. On failure the placeholder text is returned and the cause is
 * reported through diagnostics.
 */
export function createModsInformation(
	modsPath: string,
	diagnostics: Logger = getDiagnosticsLogger("session"),
): string {
	try {
		return formatDirectoryOutline(readDirectoryTree(path.resolve(modsPath)));
	} catch (error) {
		diagnostics.error("Failed to get mod information: {message}", {
			message: toError(error).message,
			modsPath,
		});
		return MODS_INFORMATION_FAILURE;
	}
}
