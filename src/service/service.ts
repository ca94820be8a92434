/**
 * Logging service: owns the logger, the flush ticker and the applied
 * settings, and reacts to setting changes.
 *
 * @module service/service
 */

import type { Logger } from "@logtape/logtape";
import { DebugLogger, type DebugLoggerOptions } from "../engine/index.js";
import { toError } from "../errors/index.js";
import { LogLevel } from "../levels/index.js";
import { getDiagnosticsLogger } from "../logging/index.js";
import { type Localizer, OnceNotifier, type WriteFailureNotifier } from "../notify/index.js";
import { collectLogFilesToReport, type ReportRegistry } from "../reporting/index.js";
import { FlushTicker } from "../scheduler/index.js";
import {
	type DebugSettings,
	formatSettingValue,
	SETTING_FIELDS,
	SETTING_KEYS,
	type SettingsSource,
} from "../settings/index.js";
import { LogSink } from "../sink/index.js";

export interface LoggerServiceOptions
	extends Omit<DebugLoggerOptions, "notifier" | "internalGroup" | "diagnostics"> {
	/** Group of the service's own records and prefix of localization keys. */
	namespace?: string;
	/** Host surface for the one-time write failure notification. */
	notifier?: WriteFailureNotifier;
	localizer?: Localizer;
	/** Registry the service adds its report collector to while started. */
	reports?: ReportRegistry;
	ticker?: FlushTicker;
	diagnostics?: Logger;
}

/**
 * @example
 * ```typescript
 * const service = new LoggerService({ rootPath: "/game/Debug/Logs", modsPath: "/game/Mods" });
 * service.start(new SettingsStore(loadSettingsFile(settingsPath).settings));
 * service.sink.warning("Loader", "Skipped {} packs", { args: [2] });
 * service.stop();
 * ```
 */
export class LoggerService {
	readonly logger: DebugLogger;
	readonly sink: LogSink;
	readonly namespace: string;

	private readonly ticker: FlushTicker;
	private readonly reports: ReportRegistry | undefined;
	private readonly diagnostics: Logger;
	private readonly collectReportFiles = (): string[] => this.getLogFilesToReport();
	private settings: DebugSettings | undefined;
	private unsubscribe: (() => void) | undefined;

	constructor(options: LoggerServiceOptions) {
		const { namespace = "Hearthlog", notifier, localizer, reports, ticker, diagnostics, ...rest } =
			options;

		this.namespace = namespace;
		this.ticker = ticker ?? new FlushTicker();
		this.reports = reports;
		this.diagnostics = diagnostics ?? getDiagnosticsLogger("service");
		this.logger = new DebugLogger({
			...rest,
			internalGroup: namespace,
			notifier:
				notifier === undefined
					? undefined
					: new OnceNotifier({ namespace, notifier, localizer }),
		});
		this.sink = new LogSink(this.logger);
	}

	/** Settings last applied, or undefined before the first configuration. */
	get currentSettings(): DebugSettings | undefined {
		return this.settings;
	}

	get isStarted(): boolean {
		return this.unsubscribe !== undefined;
	}

	/**
	 * Apply settings, reporting each changed value and reacting to
	 * transitions of the enabled flag, the interval and the written views.
	 */
	configure(next: DebugSettings): void {
		const previous = this.settings;

		if (previous !== undefined) {
			const viewTurnedOff =
				(previous.writeChronological && !next.writeChronological) ||
				(previous.writeGroups && !next.writeGroups);
			if (previous.loggingEnabled && next.loggingEnabled && viewTurnedOff) {
				this.logger.flush();
			}

			// Each key applies right after its change message
			let staged = previous;
			for (const field of SETTING_FIELDS) {
				if (staged[field] === next[field]) continue;
				this.logger.log(
					`Updating setting '${SETTING_KEYS[field]}' to '${formatSettingValue(field, next[field])}'.`,
					LogLevel.Info,
					{ group: this.namespace, owner: "service" },
				);
				staged = withSetting(staged, next, field);
				this.logger.applySettings(staged);
			}
		}

		this.settings = next;
		this.logger.applySettings(next);

		if (previous === undefined) {
			if (!next.loggingEnabled) {
				this.logger.clearPending();
			}
		} else if (!previous.loggingEnabled && next.loggingEnabled) {
			this.logger.changeLogFile();
		} else if (previous.loggingEnabled && !next.loggingEnabled) {
			this.logger.flush();
		} else if (next.loggingEnabled && previous.logInterval > 0 && next.logInterval === 0) {
			this.logger.flush();
		}

		this.reconcileTicker(next);
	}

	/**
	 * Apply the source's settings, follow its changes and write everything
	 * logged before the service started.
	 */
	start(source: SettingsSource): void {
		this.unsubscribe?.();
		this.configure(source.current());
		this.unsubscribe = source.subscribe((settings) => this.configure(settings));
		this.reports?.register(this.collectReportFiles);
		this.logger.flush();
	}

	/**
	 * Stop following settings and the ticker, then write what is queued.
	 */
	stop(): void {
		this.unsubscribe?.();
		this.unsubscribe = undefined;
		this.reports?.unregister(this.collectReportFiles);
		this.ticker.stop();
		this.logger.flush();
	}

	flush(): void {
		this.logger.flush();
	}

	getLogFilesToReport(): string[] {
		return collectLogFilesToReport(this.logger.rootPath);
	}

	private reconcileTicker(settings: DebugSettings): void {
		const desired = settings.loggingEnabled && settings.logInterval > 0;

		if (!desired) {
			this.ticker.stop();
			return;
		}

		if (this.ticker.isRunning && this.ticker.intervalSeconds === settings.logInterval) {
			return;
		}

		this.ticker.stop();
		this.ticker.start(settings.logInterval, () => this.tick());
	}

	private tick(): void {
		try {
			this.logger.flush();
		} catch (error) {
			this.diagnostics.error("Scheduled flush failed: {message}", {
				message: toError(error).message,
			});
		}
	}
}

function withSetting<K extends keyof DebugSettings>(
	base: DebugSettings,
	next: DebugSettings,
	field: K,
): DebugSettings {
	const staged = { ...base };
	staged[field] = next[field];
	return staged;
}
