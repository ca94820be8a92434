/**
 * Diagnostics logging defaults.
 *
 * These values can be overridden when creating a diagnostics logger.
 */

/** Root LogTape category for every diagnostics logger */
export const DIAGNOSTICS_CATEGORY = "hearthlog";

/** Maximum diagnostics file size before rotation (1 MiB) */
export const DEFAULT_MAX_SIZE: number = 0x400 * 0x400;

/** Number of rotated files to keep */
export const DEFAULT_MAX_FILES = 5;

/** Default diagnostics file name, without extension */
export const DEFAULT_LOG_FILE_NAME = "diagnostics";

/** Default diagnostics file extension */
export const DEFAULT_LOG_EXTENSION = ".jsonl";

/**
 * Levels used for the engine's own diagnostics.
 *
 * Note: LogTape uses "warning" not "warn" for consistency with its API.
 *
 * - DEBUG: Latest.xml fallbacks, skipped files
 * - INFO: Rotations, settings changes, capped files
 * - WARNING: Write failures, unreadable report directories
 * - ERROR: Snapshot failures, poisoned loggers
 */
export type DiagnosticsLevel = "debug" | "info" | "warning" | "error";

/** Default lowest level to capture */
export const DEFAULT_LOG_LEVEL: DiagnosticsLevel = "debug";
