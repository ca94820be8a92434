/**
 * Persisted logging settings.
 *
 * The document is validated once at the boundary. Keys that fail validation
 * fall back to their defaults and are reported as issues; the rest of the
 * document still applies.
 *
 * @module settings/settings
 */

import { z } from "zod";
import {
	ensureParentDirSync,
	pathExistsSync,
	readTextFileSync,
	writeTextFileSync,
} from "../fs/index.js";
import {
	findLogLevel,
	isLogLevel,
	LOG_LEVEL_NAMES,
	type LogLevel,
	logLevelName,
} from "../levels/index.js";

/** Upper bound of the flush interval, in seconds. */
export const MAX_LOG_INTERVAL = 86400;

export const settingsDocumentSchema = z.object({
	Logging_Enabled: z.boolean().default(true),
	Write_Chronological: z.boolean().default(true),
	Write_Groups: z.boolean().default(false),
	Log_Level: z
		.string()
		.transform((value, ctx) => {
			const level = findLogLevel(value);
			if (level === undefined) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					message: `Expected one of ${LOG_LEVEL_NAMES.join(", ")}`,
				});
				return z.NEVER;
			}
			return level;
		})
		.default("Warning"),
	Log_Interval: z.number().min(0).max(MAX_LOG_INTERVAL).default(20),
	Log_Size_Limit: z.number().finite().default(5),
});

/** Settings document as persisted, before defaults apply. */
export type SettingsDocument = z.input<typeof settingsDocumentSchema>;

/**
 * Typed logging settings.
 */
export interface DebugSettings {
	readonly loggingEnabled: boolean;
	readonly writeChronological: boolean;
	readonly writeGroups: boolean;
	/** Least severe level that is kept. */
	readonly logLevel: LogLevel;
	/** Seconds between flushes. 0 writes every record immediately. */
	readonly logInterval: number;
	/** Per-file cap in megabytes. Negative means unlimited. */
	readonly logSizeLimit: number;
}

/** Persisted key of each setting. */
export const SETTING_KEYS = {
	loggingEnabled: "Logging_Enabled",
	writeChronological: "Write_Chronological",
	writeGroups: "Write_Groups",
	logLevel: "Log_Level",
	logInterval: "Log_Interval",
	logSizeLimit: "Log_Size_Limit",
} as const satisfies Record<keyof DebugSettings, keyof SettingsDocument>;

/** Every setting, in the order changes are reported. */
export const SETTING_FIELDS: readonly (keyof DebugSettings)[] = [
	"loggingEnabled",
	"writeChronological",
	"writeGroups",
	"logLevel",
	"logInterval",
	"logSizeLimit",
];

export const DEFAULT_SETTINGS: DebugSettings = toDebugSettings(settingsDocumentSchema.parse({}));

export interface ParsedSettings {
	readonly settings: DebugSettings;
	/** One line per rejected key, e.g. `Log_Interval: Number must be ...`. */
	readonly issues: readonly string[];
}

function toDebugSettings(document: z.output<typeof settingsDocumentSchema>): DebugSettings {
	return {
		loggingEnabled: document.Logging_Enabled,
		writeChronological: document.Write_Chronological,
		writeGroups: document.Write_Groups,
		logLevel: document.Log_Level,
		logInterval: document.Log_Interval,
		logSizeLimit: document.Log_Size_Limit,
	};
}

function describeIssues(error: z.ZodError): string[] {
	return error.issues.map((issue) =>
		issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
	);
}

/**
 * Validate a settings document.
 *
 * @example
 * ```typescript
 * parseSettings({ Log_Level: "debug", Log_Interval: -1 });
 * // settings.logLevel === LogLevel.Debug, settings.logInterval === 20,
 * // issues: ["Log_Interval: Number must be greater than or equal to 0"]
 * ```
 */
export function parseSettings(document: unknown): ParsedSettings {
	const container = z.record(z.unknown()).safeParse(document ?? {});
	if (!container.success) {
		return { settings: DEFAULT_SETTINGS, issues: describeIssues(container.error) };
	}

	const result = settingsDocumentSchema.safeParse(container.data);
	if (result.success) {
		return { settings: toDebugSettings(result.data), issues: [] };
	}

	const candidate: Record<string, unknown> = { ...container.data };
	for (const issue of result.error.issues) {
		const key = issue.path[0];
		if (typeof key === "string") {
			delete candidate[key];
		}
	}

	const retry = settingsDocumentSchema.safeParse(candidate);
	return {
		settings: retry.success ? toDebugSettings(retry.data) : DEFAULT_SETTINGS,
		issues: describeIssues(result.error),
	};
}

/**
 * Convert settings back to their persisted form.
 */
export function toSettingsDocument(settings: DebugSettings): SettingsDocument {
	return {
		Logging_Enabled: settings.loggingEnabled,
		Write_Chronological: settings.writeChronological,
		Write_Groups: settings.writeGroups,
		Log_Level: logLevelName(settings.logLevel),
		Log_Interval: settings.logInterval,
		Log_Size_Limit: settings.logSizeLimit,
	};
}

/**
 * Per-file cap in bytes, or -1 when unlimited.
 */
export function sizeLimitBytes(settings: DebugSettings): number {
	if (settings.logSizeLimit < 0) return -1;
	return Math.round(settings.logSizeLimit * 1_000_000);
}

/**
 * Render the persisted value of a setting as shown in change messages.
 */
export function formatSettingValue<K extends keyof DebugSettings>(
	key: K,
	value: DebugSettings[K],
): string {
	if (key === "logLevel" && isLogLevel(value)) {
		return logLevelName(value);
	}
	return String(value);
}

/**
 * Load settings from a JSON file.
 *
 * A missing file yields the defaults with no issues. Unreadable or
 * malformed files yield the defaults with the problem as an issue.
 */
export function loadSettingsFile(filePath: string): ParsedSettings {
	if (!pathExistsSync(filePath)) {
		return { settings: DEFAULT_SETTINGS, issues: [] };
	}

	let raw: unknown;
	try {
		raw = JSON.parse(readTextFileSync(filePath));
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		return { settings: DEFAULT_SETTINGS, issues: [`${filePath}: ${message}`] };
	}

	return parseSettings(raw);
}

/**
 * Write settings to a JSON file, creating parent directories.
 */
export function saveSettingsFile(filePath: string, settings: DebugSettings): void {
	ensureParentDirSync(filePath);
	writeTextFileSync(filePath, `${JSON.stringify(toSettingsDocument(settings), null, "\t")}\n`);
}
