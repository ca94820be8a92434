/**
 * Host-facing logging API.
 *
 * @module sink
 */

export {
	type ExceptionSinkOptions,
	formatMessage,
	GroupLogger,
	LogSink,
	type SinkOptions,
} from "./sink.js";
