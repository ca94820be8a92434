/**
 * Structured error types for the debug logging engine.
 *
 * Every failure this package raises carries:
 * - A machine-readable error code and category
 * - A recoverability hint (the engine rotates on recoverable write faults)
 * - Context metadata (file paths, offending values)
 * - The underlying error via `cause`
 *
 * @module errors/structured-error
 */

/**
 * Error categories used across the logging engine.
 */
export type ErrorCategory =
	| "VALIDATION" // Bad input to a public call, or a log file failing verification
	| "CONFIGURATION" // Settings that could not be parsed
	| "IO" // Filesystem create/append/read failure
	| "INTERNAL" // Unexpected engine state
	| "UNKNOWN"; // Uncategorized

/**
 * Base error with categorization, recoverability, and context.
 *
 * @example
 * ```typescript
 * throw new StructuredError(
 *   "Unknown log level 'Loud'",
 *   "CONFIGURATION",
 *   "UNKNOWN_LOG_LEVEL",
 *   false,
 *   { value: "Loud" },
 * );
 * ```
 */
export class StructuredError extends Error {
	/**
	 * High-level error category for classification.
	 */
	public readonly category: ErrorCategory;

	/**
	 * Machine-readable error code (e.g., "LOG_END_MISMATCH").
	 */
	public readonly code: string;

	/**
	 * Whether the engine may recover from this error by rotating and retrying.
	 */
	public readonly recoverable: boolean;

	/**
	 * Arbitrary context metadata for debugging.
	 */
	public readonly context: Record<string, unknown>;

	public override readonly cause?: Error;

	constructor(
		message: string,
		category: ErrorCategory,
		code: string,
		recoverable: boolean,
		context: Record<string, unknown> = {},
		cause?: Error,
	) {
		super(message);
		this.name = "StructuredError";
		this.category = category;
		this.code = code;
		this.recoverable = recoverable;
		this.context = context;
		this.cause = cause;

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, new.target);
		}
	}

	/**
	 * Serialize error to JSON for diagnostics.
	 */
	toJSON(): {
		name: string;
		message: string;
		category: ErrorCategory;
		code: string;
		recoverable: boolean;
		context: Record<string, unknown>;
		stack?: string;
		cause?: {
			name: string;
			message: string;
			stack?: string;
		};
	} {
		return {
			name: this.name,
			message: this.message,
			category: this.category,
			code: this.code,
			recoverable: this.recoverable,
			context: this.context,
			stack: this.stack,
			cause: this.cause
				? {
						name: this.cause.name,
						message: this.cause.message,
						stack: this.cause.stack,
					}
				: undefined,
		};
	}
}

/**
 * Which end of a log file failed verification.
 */
export type LogFileEnd = "start" | "end";

/**
 * Raised when an existing log file does not begin or end with the expected
 * marker bytes. Callers treat it exactly like a write failure.
 */
export class LogIntegrityError extends StructuredError {
	public readonly end: LogFileEnd;

	constructor(filePath: string, end: LogFileEnd) {
		super(
			`The ${end} of the log file doesn't match what was expected.`,
			"VALIDATION",
			end === "start" ? "LOG_START_MISMATCH" : "LOG_END_MISMATCH",
			true,
			{ filePath },
		);
		this.name = "LogIntegrityError";
		this.end = end;
	}
}

/**
 * Raised at the `log` call boundary for arguments of the wrong shape.
 * These are programming errors in a caller, never runtime conditions.
 */
export class LogInputError extends StructuredError {
	constructor(argument: string, expected: string, received: unknown) {
		super(
			`Expected '${argument}' to be ${expected}, got ${describeValue(received)}.`,
			"VALIDATION",
			"INVALID_LOG_INPUT",
			false,
			{ argument, expected },
		);
		this.name = "LogInputError";
	}
}

function describeValue(value: unknown): string {
	if (value === null) return "null";
	if (Array.isArray(value)) return "array";
	return typeof value;
}

/**
 * Wrap an arbitrary thrown value as an `Error` suitable for `cause`.
 */
export function toError(value: unknown): Error {
	return value instanceof Error ? value : new Error(String(value));
}

/**
 * Type guard to check if an error is a StructuredError.
 */
export function isStructuredError(error: unknown): error is StructuredError {
	return error instanceof StructuredError;
}

/**
 * Type guard to check if an error is recoverable.
 */
export function isRecoverableError(error: unknown): boolean {
	return isStructuredError(error) && error.recoverable;
}
