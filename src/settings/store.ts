/**
 * Observable settings holder.
 *
 * @module settings/store
 */

import { DEFAULT_SETTINGS, type DebugSettings } from "./settings.js";

export type SettingsListener = (settings: DebugSettings) => void;

/**
 * Where the logging service reads settings from and learns about changes.
 */
export interface SettingsSource {
	current(): DebugSettings;
	/** @returns A function that removes the listener */
	subscribe(listener: SettingsListener): () => void;
}

function sameSettings(a: DebugSettings, b: DebugSettings): boolean {
	return (
		a.loggingEnabled === b.loggingEnabled &&
		a.writeChronological === b.writeChronological &&
		a.writeGroups === b.writeGroups &&
		a.logLevel === b.logLevel &&
		a.logInterval === b.logInterval &&
		a.logSizeLimit === b.logSizeLimit
	);
}

/**
 * In-memory {@link SettingsSource} that notifies listeners on change.
 *
 * @example
 * ```typescript
 * const store = new SettingsStore();
 * const unsubscribe = store.subscribe((settings) => service.configure(settings));
 * store.update({ logInterval: 0 });
 * ```
 */
export class SettingsStore implements SettingsSource {
	private settings: DebugSettings;
	private readonly listeners = new Set<SettingsListener>();

	constructor(initial: DebugSettings = DEFAULT_SETTINGS) {
		this.settings = initial;
	}

	current(): DebugSettings {
		return this.settings;
	}

	subscribe(listener: SettingsListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	/**
	 * Merge `patch` into the current settings. Listeners run only when a
	 * value actually changed.
	 */
	update(patch: Partial<DebugSettings>): DebugSettings {
		return this.replace({ ...this.settings, ...patch });
	}

	replace(settings: DebugSettings): DebugSettings {
		if (sameSettings(this.settings, settings)) {
			return this.settings;
		}
		this.settings = settings;
		for (const listener of [...this.listeners]) {
			listener(settings);
		}
		return settings;
	}
}
