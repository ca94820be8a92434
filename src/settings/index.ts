/**
 * Logging settings: schema, persistence and change notification.
 *
 * @module settings
 */

export {
	DEFAULT_SETTINGS,
	type DebugSettings,
	formatSettingValue,
	loadSettingsFile,
	MAX_LOG_INTERVAL,
	type ParsedSettings,
	parseSettings,
	SETTING_FIELDS,
	SETTING_KEYS,
	type SettingsDocument,
	saveSettingsFile,
	settingsDocumentSchema,
	sizeLimitBytes,
	toSettingsDocument,
} from "./settings.js";
export { type SettingsListener, type SettingsSource, SettingsStore } from "./store.js";
