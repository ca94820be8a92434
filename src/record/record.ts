/**
 * Log record entity and its rendering to the on-disk markup.
 *
 * @module record/record
 */

import { EOL } from "node:os";
import { escapeAttribute, escapeCommentText } from "../markup/index.js";
import { isSevere, type LogLevel, logLevelName } from "../levels/index.js";
import { formatException } from "./stack.js";

/** Group attribute written for records logged without a group. */
export const NO_GROUP = "None";

/**
 * Fields describing one log event.
 */
export interface LogRecordInit {
	/** Sequence number, 1-based and strictly increasing per logger. */
	number: number;
	/** Creation time as a local ISO-8601 string. */
	logTime: string;
	message: string;
	level: LogLevel;
	group?: string | null;
	owner?: string | null;
	exception?: unknown;
	/** Capture the stack even below `Error` severity. */
	logStack?: boolean;
	stacktrace: string;
	retryOnError?: boolean;
}

/**
 * One log event. Immutable apart from `retryOnError`, which the failure
 * path clears before retrying a batch.
 */
export class LogRecord {
	readonly number: number;
	readonly logTime: string;
	readonly message: string;
	readonly level: LogLevel;
	readonly group: string;
	readonly owner: string | undefined;
	readonly exception: unknown;
	readonly hasException: boolean;
	readonly logStack: boolean;
	readonly stacktrace: string;
	retryOnError: boolean;

	constructor(init: LogRecordInit) {
		this.number = init.number;
		this.logTime = init.logTime;
		this.message = init.message;
		this.level = init.level;
		this.group = init.group ?? NO_GROUP;
		this.owner = init.owner ?? undefined;
		this.hasException = init.exception !== undefined && init.exception !== null;
		this.exception = init.exception;
		this.logStack = init.logStack ?? false;
		this.stacktrace = init.stacktrace;
		this.retryOnError = init.retryOnError ?? true;
	}

	/** Whether the rendered block carries a `<Stacktrace>` section. */
	get includesStacktrace(): boolean {
		return isSevere(this.level) || this.logStack;
	}
}

function commentSection(tag: string, text: string): string {
	return `\t\t<${tag}><!--\n\t\t\t-->${escapeCommentText(text)}<!--\n\t\t--></${tag}>\n`;
}

/**
 * Render a record as text with the host's native line endings.
 *
 * @param writeTime - Batch write time, written as `WriteTime` when given
 */
export function renderRecordText(record: LogRecord, writeTime?: string): string {
	let text = `\t<Log Number="${record.number}" Level="${logLevelName(record.level)}" Group="${escapeAttribute(record.group)}"`;

	if (record.owner !== undefined) {
		text += ` Owner="${escapeAttribute(record.owner)}"`;
	}

	text += ` LogTime="${record.logTime}"`;

	if (writeTime !== undefined) {
		text += ` WriteTime="${writeTime}"`;
	}

	text += ">\n";
	text += commentSection("Message", record.message);

	if (record.hasException) {
		text += commentSection("Exception", formatException(record.exception));
	}

	if (record.includesStacktrace) {
		text += commentSection("Stacktrace", record.stacktrace);
	}

	text += "\t</Log>";

	return text.replace(/\n/g, EOL);
}

/**
 * Render a record as UTF-8 bytes.
 */
export function renderRecord(record: LogRecord, writeTime?: string): Buffer {
	return Buffer.from(renderRecordText(record, writeTime), "utf8");
}
