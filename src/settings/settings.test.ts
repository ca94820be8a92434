import path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { LogLevel } from "../levels/index.js";
import { cleanupTestDir, createTempDir, readTestFile, writeTestFile } from "../testing/index.js";
import {
	DEFAULT_SETTINGS,
	formatSettingValue,
	loadSettingsFile,
	parseSettings,
	saveSettingsFile,
	sizeLimitBytes,
	toSettingsDocument,
} from "./settings.js";

describe("DEFAULT_SETTINGS", () => {
	test("matches the documented defaults", () => {
		expect(DEFAULT_SETTINGS).toEqual({
			loggingEnabled: true,
			writeChronological: true,
			writeGroups: false,
			logLevel: LogLevel.Warning,
			logInterval: 20,
			logSizeLimit: 5,
		});
	});
});

describe("parseSettings", () => {
	test("maps a complete document", () => {
		const { settings, issues } = parseSettings({
			Logging_Enabled: false,
			Write_Chronological: false,
			Write_Groups: true,
			Log_Level: "debug",
			Log_Interval: 0,
			Log_Size_Limit: -1,
		});

		expect(issues).toEqual([]);
		expect(settings).toEqual({
			loggingEnabled: false,
			writeChronological: false,
			writeGroups: true,
			logLevel: LogLevel.Debug,
			logInterval: 0,
			logSizeLimit: -1,
		});
	});

	test("fills missing keys with defaults", () => {
		const { settings, issues } = parseSettings({ Write_Groups: true });

		expect(issues).toEqual([]);
		expect(settings).toEqual({ ...DEFAULT_SETTINGS, writeGroups: true });
	});

	test("replaces only the invalid keys", () => {
		const { settings, issues } = parseSettings({
			Log_Level: "Loud",
			Log_Interval: 90000,
			Write_Groups: true,
		});

		expect(settings).toEqual({ ...DEFAULT_SETTINGS, writeGroups: true });
		expect(issues).toHaveLength(2);
		expect(issues[0]).toBe("Log_Level: Expected one of Exception, Error, Warning, Info, Debug");
		expect(issues[1]).toMatch(/^Log_Interval: /);
	});

	test("treats null as an empty document", () => {
		expect(parseSettings(null)).toEqual({ settings: DEFAULT_SETTINGS, issues: [] });
	});

	test("rejects a document that is not an object", () => {
		const { settings, issues } = parseSettings([1, 2]);

		expect(settings).toBe(DEFAULT_SETTINGS);
		expect(issues).toHaveLength(1);
	});
});

describe("toSettingsDocument", () => {
	test("writes the level by name", () => {
		expect(toSettingsDocument(DEFAULT_SETTINGS)).toEqual({
			Logging_Enabled: true,
			Write_Chronological: true,
			Write_Groups: false,
			Log_Level: "Warning",
			Log_Interval: 20,
			Log_Size_Limit: 5,
		});
	});
});

describe("sizeLimitBytes", () => {
	test("converts megabytes to bytes", () => {
		expect(sizeLimitBytes(DEFAULT_SETTINGS)).toBe(5_000_000);
		expect(sizeLimitBytes({ ...DEFAULT_SETTINGS, logSizeLimit: 0.5 })).toBe(500_000);
	});

	test("returns -1 for a negative limit", () => {
		expect(sizeLimitBytes({ ...DEFAULT_SETTINGS, logSizeLimit: -3 })).toBe(-1);
	});
});

describe("formatSettingValue", () => {
	test("shows levels by name and other values as text", () => {
		expect(formatSettingValue("logLevel", LogLevel.Info)).toBe("Info");
		expect(formatSettingValue("loggingEnabled", false)).toBe("false");
		expect(formatSettingValue("logInterval", 2.5)).toBe("2.5");
	});
});

describe("settings files", () => {
	let root: string;

	beforeEach(() => {
		root = createTempDir("settings-");
	});

	afterEach(() => {
		cleanupTestDir(root);
	});

	test("a missing file yields defaults", () => {
		expect(loadSettingsFile(path.join(root, "missing.json"))).toEqual({
			settings: DEFAULT_SETTINGS,
			issues: [],
		});
	});

	test("malformed JSON yields defaults and an issue", () => {
		writeTestFile(root, "settings.json", "{ not json");

		const { settings, issues } = loadSettingsFile(path.join(root, "settings.json"));

		expect(settings).toBe(DEFAULT_SETTINGS);
		expect(issues).toHaveLength(1);
	});

	test("round-trips through save and load", () => {
		const filePath = path.join(root, "nested", "settings.json");
		const saved = { ...DEFAULT_SETTINGS, logLevel: LogLevel.Error, logInterval: 5 };

		saveSettingsFile(filePath, saved);

		expect(JSON.parse(readTestFile(root, path.join("nested", "settings.json")))).toEqual({
			Logging_Enabled: true,
			Write_Chronological: true,
			Write_Groups: false,
			Log_Level: "Error",
			Log_Interval: 5,
			Log_Size_Limit: 5,
		});
		expect(loadSettingsFile(filePath).settings).toEqual(saved);
	});
});
