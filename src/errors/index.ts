/**
 * Error handling utilities and base classes.
 *
 * @module errors
 */

export {
	type ErrorCategory,
	isRecoverableError,
	isStructuredError,
	type LogFileEnd,
	LogInputError,
	LogIntegrityError,
	StructuredError,
	toError,
} from "./structured-error.js";
