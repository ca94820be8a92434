/**
 * Timestamp formatting for log records and log directory names.
 *
 * All values use local wall-clock time with microsecond precision
 * (JavaScript dates carry milliseconds, so the last three digits are
 * always zero).
 *
 * @module formatters/time
 * @example
 * ```ts
 * const date = new Date(2026, 9, 19, 14, 30, 5, 42);
 * formatLogTimestamp(date); // "2026-10-19T14:30:05.042000"
 * formatDirectoryName(date); // "2026-10-19 14.30.05.042000"
 * parseDirectoryName("2026-10-19 14.30.05.042000"); // Date
 * ```
 */

function pad(value: number, width = 2): string {
	return value.toString().padStart(width, "0");
}

function datePart(date: Date): string {
	return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

function microseconds(date: Date): string {
	return pad(date.getMilliseconds() * 1000, 6);
}

/**
 * Format a Date as a local ISO-8601 timestamp for the `LogTime` and
 * `WriteTime` attributes.
 */
export function formatLogTimestamp(date: Date): string {
	const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
	return `${datePart(date)}T${time}.${microseconds(date)}`;
}

/**
 * Format a Date as a log directory name, `YYYY-MM-DD HH.MM.SS.ffffff`.
 * Names sort lexicographically in chronological order.
 */
export function formatDirectoryName(date: Date): string {
	const time = `${pad(date.getHours())}.${pad(date.getMinutes())}.${pad(date.getSeconds())}`;
	return `${datePart(date)} ${time}.${microseconds(date)}`;
}

const DIRECTORY_NAME_PATTERN =
	/^(\d{4})-(\d{2})-(\d{2}) (\d{2})\.(\d{2})\.(\d{2})\.(\d{6})$/;

/**
 * Parse a log directory name back into a Date.
 *
 * @returns The local time the name encodes, or null when the name does not
 *   follow the convention or names an impossible date
 */
export function parseDirectoryName(name: string): Date | null {
	const match = DIRECTORY_NAME_PATTERN.exec(name);
	if (!match) {
		return null;
	}

	const year = Number(match[1]);
	const month = Number(match[2]);
	const day = Number(match[3]);
	const hours = Number(match[4]);
	const minutes = Number(match[5]);
	const seconds = Number(match[6]);
	const micros = Number(match[7]);

	const date = new Date(
		year,
		month - 1,
		day,
		hours,
		minutes,
		seconds,
		Math.floor(micros / 1000),
	);

	// Reject rollovers such as month 13 or 25 o'clock
	if (
		date.getFullYear() !== year ||
		date.getMonth() !== month - 1 ||
		date.getDate() !== day ||
		date.getHours() !== hours ||
		date.getMinutes() !== minutes ||
		date.getSeconds() !== seconds
	) {
		return null;
	}

	return date;
}
