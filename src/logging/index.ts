/**
 * Diagnostics logging for the engine itself.
 *
 * Provides a factory for LogTape loggers with:
 * - JSONL file output for machine-parseable diagnostics
 * - Automatic file rotation (1MB default, 5 files)
 * - Hierarchical categories for subsystem filtering
 *
 * @example
 * ```typescript
 * import { createDiagnosticsLogger } from "@hearthlog/debug";
 *
 * const { initLogger } = createDiagnosticsLogger({ logDir: "/var/game/Debug" });
 * await initLogger();
 * ```
 *
 * @packageDocumentation
 */

export {
	DEFAULT_LOG_EXTENSION,
	DEFAULT_LOG_FILE_NAME,
	DEFAULT_LOG_LEVEL,
	DEFAULT_MAX_FILES,
	DEFAULT_MAX_SIZE,
	DIAGNOSTICS_CATEGORY,
	type DiagnosticsLevel,
} from "./config.js";
export {
	createDiagnosticsLogger,
	type DiagnosticsLogger,
	type DiagnosticsLoggerOptions,
	getDiagnosticsLogger,
} from "./factory.js";
