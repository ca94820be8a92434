/**
 * Buffer and flush engine.
 *
 * @module engine
 */

export {
	DebugLogger,
	type DebugLoggerOptions,
	DEFAULT_WRITE_FAILURE_LIMIT,
	type LogOptions,
} from "./logger.js";
