/**
 * Diagnostics Logger Factory.
 *
 * Creates configured LogTape loggers for the engine's own diagnostics with:
 * - JSONL file output with rotation
 * - Hierarchical categories under `hearthlog` for subsystem filtering
 *
 * The debug log files the engine writes are its product; these loggers only
 * describe what the engine itself is doing.
 */

import { existsSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import { getRotatingFileSink } from "@logtape/file";
import {
	configure,
	getLogger,
	jsonLinesFormatter,
	type Logger,
} from "@logtape/logtape";
import {
	DEFAULT_LOG_EXTENSION,
	DEFAULT_LOG_FILE_NAME,
	DEFAULT_LOG_LEVEL,
	DEFAULT_MAX_FILES,
	DEFAULT_MAX_SIZE,
	DIAGNOSTICS_CATEGORY,
	type DiagnosticsLevel,
} from "./config.js";

/**
 * Options for creating a diagnostics logger.
 */
export interface DiagnosticsLoggerOptions {
	/** Directory the diagnostics file is written to. */
	logDir: string;

	/**
	 * Subsystem names for hierarchical loggers.
	 *
	 * @example ["writer", "service"] → loggers for ["hearthlog", "writer"], etc.
	 */
	subsystems?: string[];

	/**
	 * Log file name (without extension). Defaults to "diagnostics".
	 * Results in: <logDir>/<logFileName>.jsonl
	 */
	logFileName?: string;

	/** Maximum file size before rotation. Defaults to 1 MiB. */
	maxSize?: number;

	/** Number of rotated files to keep. Defaults to 5. */
	maxFiles?: number;

	/** Lowest level to capture. Defaults to "debug". */
	lowestLevel?: DiagnosticsLevel;
}

/**
 * Result of creating a diagnostics logger.
 */
export interface DiagnosticsLogger {
	/**
	 * Configure LogTape. Safe to call multiple times - only initializes once.
	 */
	initLogger: () => Promise<void>;

	/** Logger for the root `hearthlog` category. */
	rootLogger: Logger;

	/**
	 * Get a subsystem logger by name.
	 *
	 * @returns Logger for ["hearthlog", subsystem]
	 */
	getSubsystemLogger: (subsystem: string) => Logger;

	logDir: string;

	logFile: string;

	/** Pre-created subsystem loggers, keyed by subsystem name. */
	subsystemLoggers: Record<string, Logger>;
}

/**
 * Logger for one engine subsystem. Silent until LogTape is configured.
 */
export function getDiagnosticsLogger(subsystem: string): Logger {
	return getLogger([DIAGNOSTICS_CATEGORY, subsystem]);
}

/**
 * Create a configured diagnostics logger.
 *
 * @example
 * ```typescript
 * const { initLogger, subsystemLoggers } = createDiagnosticsLogger({
 *   logDir: "/var/game/Debug",
 *   subsystems: ["writer", "service"],
 * });
 *
 * await initLogger();
 * subsystemLoggers.writer?.info("Log file {filePath} reached its size limit", { filePath });
 * ```
 */
export function createDiagnosticsLogger(
	options: DiagnosticsLoggerOptions,
): DiagnosticsLogger {
	const {
		logDir,
		subsystems = [],
		logFileName = DEFAULT_LOG_FILE_NAME,
		maxSize = DEFAULT_MAX_SIZE,
		maxFiles = DEFAULT_MAX_FILES,
		lowestLevel = DEFAULT_LOG_LEVEL,
	} = options;

	const logFile = join(logDir, `${logFileName}${DEFAULT_LOG_EXTENSION}`);

	let isInitialized = false;

	/**
	 * Also safe to call when LogTape is already configured (e.g., by the host).
	 */
	async function initLogger(): Promise<void> {
		if (isInitialized) return;

		if (!existsSync(logDir)) {
			mkdirSync(logDir, { recursive: true });
		}

		const sinkName = `file_${DIAGNOSTICS_CATEGORY}`;

		try {
			await configure({
				sinks: {
					[sinkName]: getRotatingFileSink(logFile, {
						formatter: jsonLinesFormatter,
						maxSize,
						maxFiles,
					}),
				},
				loggers: [
					{
						category: [DIAGNOSTICS_CATEGORY],
						sinks: [sinkName],
						lowestLevel,
					},
					{
						category: ["logtape", "meta"],
						sinks: [sinkName],
						lowestLevel: "error",
					},
				],
			});
		} catch (error: unknown) {
			// The host configured LogTape first; keep its configuration.
			if (
				error instanceof Error &&
				error.message.includes("Already configured")
			) {
				isInitialized = true;
				return;
			}
			throw error;
		}

		getLogger([DIAGNOSTICS_CATEGORY]).info("Diagnostics initialized", {
			logDir,
			logFile,
			maxSize,
			maxFiles,
		});

		isInitialized = true;
	}

	const rootLogger = getLogger([DIAGNOSTICS_CATEGORY]);

	const subsystemLoggers: Record<string, Logger> = {};
	for (const subsystem of subsystems) {
		subsystemLoggers[subsystem] = getDiagnosticsLogger(subsystem);
	}

	return {
		initLogger,
		rootLogger,
		getSubsystemLogger: getDiagnosticsLogger,
		logDir,
		logFile,
		subsystemLoggers,
	};
}
