/**
 * Filename safety for per-group log files.
 *
 * Group names are free-form labels chosen by whoever logs, but each one
 * becomes a file name under `Groups/`. Names are kept as-is when they use
 * only safe characters and rewritten otherwise.
 *
 * @module validation/filenames
 */

import { createHash } from "node:crypto";

/**
 * Characters allowed in safe filenames: alphanumeric, underscore, hyphen, dot, space.
 */
const SAFE_FILENAME_CHARS = /^[a-zA-Z0-9_\-. ]+$/;

const UNSAFE_FILENAME_CHAR = /[^a-zA-Z0-9_\-. ]/g;

/** Names the filesystem treats specially even though their characters are safe. */
const RESERVED_NAMES = new Set([".", ".."]);

/**
 * Check if a filename contains only safe characters.
 *
 * @param filename - Filename to validate (basename only, not a path)
 *
 * @example
 * ```typescript
 * isSafeFilename("Loader")           // => true
 * isSafeFilename("Mod.Settings v2")  // => true
 * isSafeFilename("a/b")              // => false
 * ```
 */
export function isSafeFilename(filename: string): boolean {
	if (!filename || filename.trim() === "") {
		return false;
	}

	return SAFE_FILENAME_CHARS.test(filename) && !RESERVED_NAMES.has(filename);
}

/**
 * Turn an arbitrary label into a safe filename stem.
 *
 * Unsafe characters become `_`. Empty, blank, and reserved names become
 * `_` as well.
 *
 * @example
 * ```typescript
 * toSafeFilename("Loader")         // => "Loader"
 * toSafeFilename("ui/settings:v2") // => "ui_settings_v2"
 * toSafeFilename("..")             // => "_"
 * ```
 */
export function toSafeFilename(label: string): string {
	if (isSafeFilename(label)) {
		return label;
	}

	const replaced = label.replace(UNSAFE_FILENAME_CHAR, "_");
	if (replaced.trim() === "" || RESERVED_NAMES.has(replaced)) {
		return "_";
	}
	return replaced;
}

/**
 * Short hex digest of a label, used to tell rewritten names apart.
 */
export function shortHash(content: string, length = 8): string {
	return createHash("sha256").update(content).digest("hex").slice(0, length);
}

/**
 * Like {@link toSafeFilename}, but a rewritten name carries a hash of the
 * original label, so distinct labels never share a stem.
 *
 * @example
 * ```typescript
 * toUniqueSafeFilename("a_b") // => "a_b"
 * toUniqueSafeFilename("a/b") // => "a_b-c14cddc0"
 * ```
 */
export function toUniqueSafeFilename(label: string): string {
	if (isSafeFilename(label)) {
		return label;
	}
	return `${toSafeFilename(label)}-${shortHash(label)}`;
}
