/**
 * Severity levels.
 *
 * Lower values are more severe. A record passes a minimum-level filter
 * when its value is less than or equal to the filter's value, so a
 * `Warning` threshold keeps `Exception`, `Error` and `Warning` records.
 *
 * @module levels
 */

import { StructuredError } from "../errors/index.js";

export const LogLevel = {
	Exception: 0,
	Error: 1,
	Warning: 2,
	Info: 3,
	Debug: 4,
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export type LogLevelName = keyof typeof LogLevel;

/** Level names ordered from most to least severe. */
export const LOG_LEVEL_NAMES: readonly LogLevelName[] = [
	"Exception",
	"Error",
	"Warning",
	"Info",
	"Debug",
];

/**
 * Check whether a value is one of the defined level values.
 */
export function isLogLevel(value: unknown): value is LogLevel {
	return (
		typeof value === "number" &&
		Number.isInteger(value) &&
		value >= LogLevel.Exception &&
		value <= LogLevel.Debug
	);
}

/**
 * Get the enumeration name of a level, as written to the `Level` attribute.
 */
export function logLevelName(level: LogLevel): LogLevelName {
	const name = LOG_LEVEL_NAMES[level];
	if (name === undefined) {
		throw new StructuredError(
			`Unknown log level value ${level}`,
			"INTERNAL",
			"UNKNOWN_LOG_LEVEL",
			false,
			{ value: level },
		);
	}
	return name;
}

/**
 * Look up a level by its enumeration name, ignoring case and surrounding
 * whitespace.
 */
export function findLogLevel(name: string): LogLevel | undefined {
	const wanted = name.trim().toLowerCase();
	for (const candidate of LOG_LEVEL_NAMES) {
		if (candidate.toLowerCase() === wanted) {
			return LogLevel[candidate];
		}
	}
	return undefined;
}

/**
 * Parse a level from its enumeration name. Matching ignores case.
 *
 * @throws StructuredError (CONFIGURATION) for an unknown name
 *
 * @example
 * ```typescript
 * parseLogLevel("warning"); // LogLevel.Warning (2)
 * ```
 */
export function parseLogLevel(name: string): LogLevel {
	const level = findLogLevel(name);
	if (level !== undefined) {
		return level;
	}
	throw new StructuredError(
		`'${name}' is not a log level. Expected one of ${LOG_LEVEL_NAMES.join(", ")}.`,
		"CONFIGURATION",
		"UNKNOWN_LOG_LEVEL",
		false,
		{ value: name },
	);
}

/**
 * True when a record at `level` survives a `minimum` threshold.
 */
export function passesThreshold(level: LogLevel, minimum: LogLevel): boolean {
	return level <= minimum;
}

/**
 * Levels at or above `Error` severity are written without waiting for
 * the next flush tick and always carry a stack trace.
 */
export function isSevere(level: LogLevel): boolean {
	return level <= LogLevel.Error;
}
