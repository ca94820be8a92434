/**
 * @hearthlog/debug
 *
 * Buffered debug logging for long-running hosts: records queue in memory,
 * flush in batches into timestamped log directories, and survive size caps,
 * damaged files and write failures.
 *
 * Import from subpath exports for narrower surfaces:
 *   import { loadSettingsFile } from "@hearthlog/debug/settings";
 *   import { collectPersistentFiles } from "@hearthlog/debug/reporting";
 *
 * @packageDocumentation
 */

export const VERSION = "0.1.0";

export {
	DebugLogger,
	type DebugLoggerOptions,
	DEFAULT_WRITE_FAILURE_LIMIT,
	type LogOptions,
} from "./engine/index.js";
export {
	type ErrorCategory,
	isRecoverableError,
	isStructuredError,
	LogInputError,
	LogIntegrityError,
	StructuredError,
	toError,
} from "./errors/index.js";
export {
	findLogLevel,
	isLogLevel,
	isSevere,
	LOG_LEVEL_NAMES,
	LogLevel,
	type LogLevelName,
	logLevelName,
	parseLogLevel,
	passesThreshold,
} from "./levels/index.js";
export {
	createDiagnosticsLogger,
	type DiagnosticsLogger,
	type DiagnosticsLoggerOptions,
	getDiagnosticsLogger,
} from "./logging/index.js";
export {
	type Localizer,
	type NotificationContent,
	OnceNotifier,
	type WriteFailureNotifier,
} from "./notify/index.js";
export { LogRecord, type LogRecordInit, NO_GROUP, renderRecord } from "./record/index.js";
export {
	collectLogFilesToReport,
	collectPersistentFiles,
	type ReportFileCollector,
	ReportRegistry,
} from "./reporting/index.js";
export { FlushTicker } from "./scheduler/index.js";
export { renderBatch, type RenderedBatch, type RenderedStream } from "./serializer/index.js";
export { LoggerService, type LoggerServiceOptions } from "./service/index.js";
export {
	createDebugSession,
	createModsInformation,
	createSessionInformation,
	type DebugSession,
} from "./session/index.js";
export {
	DEFAULT_SETTINGS,
	type DebugSettings,
	loadSettingsFile,
	parseSettings,
	saveSettingsFile,
	type SettingsSource,
	SettingsStore,
} from "./settings/index.js";
export {
	type ExceptionSinkOptions,
	GroupLogger,
	LogSink,
	type SinkOptions,
} from "./sink/index.js";
export { isLogFileIntact, verifyLogFile } from "./verify/index.js";
export {
	LogFileWriter,
	type LogWriter,
	type WriteOutcome,
	type WriteRequest,
} from "./writer/index.js";
