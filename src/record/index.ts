/**
 * Log records and their markup rendering.
 *
 * @module record
 */

export {
	LogRecord,
	type LogRecordInit,
	NO_GROUP,
	renderRecord,
	renderRecordText,
} from "./record.js";
export {
	captureStack,
	formatException,
	type StackBoundary,
} from "./stack.js";
