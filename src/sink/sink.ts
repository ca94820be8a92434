/**
 * Host-facing logging API.
 *
 * `LogSink` mirrors the host's `debug`/`info`/`warning`/`error`/`exception`
 * calls, with positional `{}` arguments, and `GroupLogger` binds a group and
 * a default owner for the host's per-group logger objects.
 *
 * @module sink/sink
 */

import type { DebugLogger } from "../engine/index.js";
import { formatTemplate } from "../formatters/index.js";
import { LogLevel } from "../levels/index.js";
import type { StackBoundary } from "../record/index.js";

export interface SinkOptions {
	owner?: string | null;
	/** Positional arguments substituted into `{}` fields of the message. */
	args?: readonly unknown[];
	/** Stack capture starts below this function's frame. */
	stackStart?: StackBoundary;
}

export interface ExceptionSinkOptions extends SinkOptions {
	exception?: unknown;
	/** Defaults to `Exception`. */
	level?: LogLevel;
	/** Record the call stack. Defaults to true. */
	logStack?: boolean;
}

/**
 * Apply positional arguments to a message. Without arguments the message is
 * returned untouched, braces included.
 */
export function formatMessage(message: string, args?: readonly unknown[]): string {
	return args !== undefined && args.length > 0 ? formatTemplate(message, args) : message;
}

export class LogSink {
	constructor(private readonly logger: DebugLogger) {}

	debug(group: string, message: string, options: SinkOptions = {}): void {
		this.write(group, message, LogLevel.Debug, options, this.debug);
	}

	info(group: string, message: string, options: SinkOptions = {}): void {
		this.write(group, message, LogLevel.Info, options, this.info);
	}

	warning(group: string, message: string, options: SinkOptions = {}): void {
		this.write(group, message, LogLevel.Warning, options, this.warning);
	}

	error(group: string, message: string, options: SinkOptions = {}): void {
		this.write(group, message, LogLevel.Error, options, this.error);
	}

	exception(group: string, message: string, options: ExceptionSinkOptions = {}): void {
		this.logger.log(formatMessage(message, options.args), options.level ?? LogLevel.Exception, {
			group,
			owner: options.owner,
			exception: options.exception,
			logStack: options.logStack ?? true,
			stackStart: options.stackStart ?? this.exception,
		});
	}

	/**
	 * Logger bound to one group.
	 */
	forGroup(group: string, owner?: string): GroupLogger {
		return new GroupLogger(this, group, owner);
	}

	private write(
		group: string,
		message: string,
		level: LogLevel,
		options: SinkOptions,
		boundary: StackBoundary,
	): void {
		this.logger.log(formatMessage(message, options.args), level, {
			group,
			owner: options.owner,
			stackStart: options.stackStart ?? boundary,
		});
	}
}

/**
 * A sink bound to a group, with an owner used when a call names none.
 *
 * @example
 * ```typescript
 * const loader = service.sink.forGroup("Loader", "loader.ts");
 * loader.warning("Skipped {} of {} packs", { args: [1, 4] });
 * ```
 */
export class GroupLogger {
	constructor(
		private readonly sink: LogSink,
		readonly group: string,
		readonly owner?: string,
	) {}

	debug(message: string, options: SinkOptions = {}): void {
		this.sink.debug(this.group, message, this.bind(options, this.debug));
	}

	info(message: string, options: SinkOptions = {}): void {
		this.sink.info(this.group, message, this.bind(options, this.info));
	}

	warning(message: string, options: SinkOptions = {}): void {
		this.sink.warning(this.group, message, this.bind(options, this.warning));
	}

	error(message: string, options: SinkOptions = {}): void {
		this.sink.error(this.group, message, this.bind(options, this.error));
	}

	exception(message: string, options: ExceptionSinkOptions = {}): void {
		this.sink.exception(this.group, message, this.bind(options, this.exception));
	}

	private bind<T extends SinkOptions>(options: T, boundary: StackBoundary): T {
		return {
			...options,
			owner: options.owner ?? this.owner,
			stackStart: options.stackStart ?? boundary,
		};
	}
}
