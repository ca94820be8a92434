/**
 * Buffering debug logger.
 *
 * Records queue in memory and are written in batches by {@link DebugLogger.flush}.
 * Severe records, and every record when the flush interval is 0, flush
 * immediately. Write failures rotate to a fresh directory and retry the batch
 * once; after `writeFailureLimit` failures the logger goes silent for the
 * rest of the process.
 *
 * @module engine/logger
 */

import path from "node:path";
import type { Logger } from "@logtape/logtape";
import { LogInputError } from "../errors/index.js";
import { formatDirectoryName, formatLogTimestamp } from "../formatters/index.js";
import { isLogLevel, isSevere, LogLevel, passesThreshold } from "../levels/index.js";
import { getDiagnosticsLogger } from "../logging/index.js";
import type { OnceNotifier } from "../notify/index.js";
import { captureStack, LogRecord, type StackBoundary } from "../record/index.js";
import { renderBatch } from "../serializer/index.js";
import {
	createDebugSession,
	createModsInformation,
	createSessionInformation,
	type DebugSession,
	type OperatingSystemDescription,
} from "../session/index.js";
import { type DebugSettings, sizeLimitBytes } from "../settings/index.js";
import { LogFileWriter, type LogWriter } from "../writer/index.js";

/** Consecutive write failures after which the logger goes silent. */
export const DEFAULT_WRITE_FAILURE_LIMIT = 2;

export interface LogOptions {
	group?: string | null;
	owner?: string | null;
	/** Record the call stack even below `Error` severity. */
	logStack?: boolean;
	exception?: unknown;
	/** Stack capture starts below this function's frame. */
	stackStart?: StackBoundary;
	/** Allow one retry of this record's batch after a write failure. */
	retryOnError?: boolean;
}

export interface DebugLoggerOptions {
	/** Directory holding `Latest.xml` and the timestamped log directories. */
	rootPath: string;
	/** Content directory described in `Mods Directory.txt`. */
	modsPath: string;
	session?: DebugSession;
	installedPacks?: readonly string[];
	/** Group of the records the logger writes about itself. */
	internalGroup?: string;
	writer?: LogWriter;
	notifier?: OnceNotifier;
	clock?: () => Date;
	describeSystem?: () => OperatingSystemDescription;
	writeFailureLimit?: number;
	diagnostics?: Logger;
}

export class DebugLogger {
	readonly rootPath: string;
	readonly session: DebugSession;

	private readonly modsPath: string;
	private readonly installedPacks: readonly string[];
	private readonly internalGroup: string;
	private readonly writer: LogWriter;
	private readonly notifier: OnceNotifier | undefined;
	private readonly clock: () => Date;
	private readonly describeSystem: (() => OperatingSystemDescription) | undefined;
	private readonly writeFailureLimit: number;
	private readonly diagnostics: Logger;

	private settings: DebugSettings | undefined;
	private pending: LogRecord[] = [];
	private sequence = 0;
	private failures = 0;
	private directoryTime: Date;
	private directory: string;
	private continuation = false;
	private sessionInformation: string;
	private modsInformation: string;

	constructor(options: DebugLoggerOptions) {
		this.rootPath = options.rootPath;
		this.modsPath = options.modsPath;
		this.clock = options.clock ?? (() => new Date());
		this.session = options.session ?? createDebugSession(this.clock());
		this.installedPacks = options.installedPacks ?? [];
		this.internalGroup = options.internalGroup ?? "Debug";
		this.diagnostics = options.diagnostics ?? getDiagnosticsLogger("engine");
		this.writer = options.writer ?? new LogFileWriter();
		this.notifier = options.notifier;
		this.describeSystem = options.describeSystem;
		this.writeFailureLimit = options.writeFailureLimit ?? DEFAULT_WRITE_FAILURE_LIMIT;

		this.directoryTime = this.session.startTime;
		this.directory = formatDirectoryName(this.directoryTime);
		this.sessionInformation = this.createSessionInformation();
		this.modsInformation = createModsInformation(this.modsPath);
	}

	/** Name of the directory the next write goes to. */
	get directoryName(): string {
		return this.directory;
	}

	get directoryPath(): string {
		return path.join(this.rootPath, this.directory);
	}

	/** Whether the current directory was opened by a rotation. */
	get isContinuation(): boolean {
		return this.continuation;
	}

	/** Number of the most recently assigned record. */
	get lastSequenceNumber(): number {
		return this.sequence;
	}

	get pendingCount(): number {
		return this.pending.length;
	}

	get writeFailureCount(): number {
		return this.failures;
	}

	/** True once the write failure limit is reached. */
	get isPoisoned(): boolean {
		return this.failures >= this.writeFailureLimit;
	}

	/** Settings last applied, or undefined before the first configuration. */
	get currentSettings(): DebugSettings | undefined {
		return this.settings;
	}

	applySettings(settings: DebugSettings): void {
		this.settings = settings;
	}

	/** Drop every queued record without writing it. */
	clearPending(): void {
		this.pending = [];
	}

	/**
	 * Queue a record.
	 *
	 * @throws LogInputError when `message` is not a string or `level` is not a level
	 */
	log(message: string, level: LogLevel, options: LogOptions = {}): void {
		if (typeof message !== "string") {
			throw new LogInputError("message", "a string", message);
		}
		if (!isLogLevel(level)) {
			throw new LogInputError("level", "a log level", level);
		}

		if (this.isPoisoned) return;
		if (this.settings !== undefined && !this.settings.loggingEnabled) return;

		this.sequence += 1;
		const number = this.sequence;

		if (this.settings !== undefined && !passesThreshold(level, this.settings.logLevel)) {
			return;
		}

		this.pending.push(
			new LogRecord({
				number,
				logTime: formatLogTimestamp(this.clock()),
				message,
				level,
				group: options.group,
				owner: options.owner,
				exception: options.exception,
				logStack: options.logStack,
				stacktrace: captureStack(options.stackStart ?? this.log),
				retryOnError: options.retryOnError,
			}),
		);

		if (this.settings !== undefined && (this.settings.logInterval === 0 || isSevere(level))) {
			this.flush();
		}
	}

	/**
	 * Write every queued record that passes the current level.
	 *
	 * Before the first configuration the queue is kept. When logging is
	 * disabled the queue is discarded.
	 */
	flush(): void {
		if (this.isPoisoned) return;

		const settings = this.settings;
		if (settings === undefined) return;

		const records = this.pending;
		this.pending = [];

		if (!settings.loggingEnabled) return;
		if (!settings.writeChronological && !settings.writeGroups) return;

		const kept = records.filter((record) => passesThreshold(record.level, settings.logLevel));
		if (kept.length === 0) return;

		this.writeRecords(kept, settings);
	}

	/**
	 * Direct later writes to a new timestamped directory and regenerate the
	 * snapshots written into it.
	 */
	changeLogFile(): void {
		let time = this.clock();
		if (time.getTime() <= this.directoryTime.getTime()) {
			time = new Date(this.directoryTime.getTime() + 1);
		}

		this.directoryTime = time;
		this.directory = formatDirectoryName(time);
		this.continuation = true;
		this.sessionInformation = this.createSessionInformation();
		this.modsInformation = createModsInformation(this.modsPath);

		this.diagnostics.info("Log directory changed to {directoryName}", {
			directoryName: this.directory,
		});
	}

	private createSessionInformation(): string {
		return createSessionInformation({
			session: this.session,
			isContinuation: this.continuation,
			installedPacks: this.installedPacks,
			describeSystem: this.describeSystem,
		});
	}

	private writeRecords(records: LogRecord[], settings: DebugSettings): void {
		const outcome = this.writer.write({
			rootPath: this.rootPath,
			directoryName: this.directory,
			sessionInformation: this.sessionInformation,
			modsInformation: this.modsInformation,
			writeChronological: settings.writeChronological,
			writeGroups: settings.writeGroups,
			sizeLimitBytes: sizeLimitBytes(settings),
			batch: renderBatch(records, {
				writeTime: formatLogTimestamp(this.clock()),
				chronological: settings.writeChronological,
				groups: settings.writeGroups,
			}),
		});

		switch (outcome.status) {
			case "written":
				return;
			case "written-with-truncation":
				this.diagnostics.info("Size limit reached for {files}", {
					files: outcome.truncatedFiles,
				});
				return;
			case "failed":
				this.handleWriteFailure(records, settings, outcome.reason);
				return;
		}
	}

	private handleWriteFailure(records: LogRecord[], settings: DebugSettings, reason: Error): void {
		this.failures += 1;
		this.notifier?.notify(reason);

		if (this.isPoisoned) {
			this.pending = [];
			this.diagnostics.error("Debug logging stopped after {failures} write failures", {
				failures: this.failures,
				message: reason.message,
			});
			return;
		}

		this.changeLogFile();

		const retrying = records.filter((record) => record.retryOnError);
		const lost = records.length - retrying.length;

		this.sequence += 1;
		this.pending.push(
			new LogRecord({
				number: this.sequence,
				logTime: formatLogTimestamp(this.clock()),
				message: `Forced to start a new log file after encountering a write error. ${lost} reports were lost because of this.`,
				level: LogLevel.Exception,
				group: this.internalGroup,
				exception: reason,
				stacktrace: captureStack(),
				retryOnError: false,
			}),
		);

		// In immediate mode the notice lands ahead of the retried batch
		if (settings.logInterval === 0) {
			this.flush();
			if (this.isPoisoned) return;
		}

		if (retrying.length > 0) {
			for (const record of retrying) {
				record.retryOnError = false;
			}
			this.writeRecords(records, settings);
		}
	}
}
