import { describe, expect, test, vi } from "vitest";
import { DEFAULT_SETTINGS } from "./settings.js";
import { SettingsStore } from "./store.js";

describe("SettingsStore", () => {
	test("starts from the defaults", () => {
		expect(new SettingsStore().current()).toBe(DEFAULT_SETTINGS);
	});

	test("notifies listeners of changes", () => {
		const store = new SettingsStore();
		const listener = vi.fn();
		store.subscribe(listener);

		const updated = store.update({ logInterval: 0 });

		expect(updated).toEqual({ ...DEFAULT_SETTINGS, logInterval: 0 });
		expect(listener).toHaveBeenCalledWith(updated);
		expect(store.current()).toBe(updated);
	});

	test("skips listeners when nothing changed", () => {
		const store = new SettingsStore();
		const listener = vi.fn();
		store.subscribe(listener);

		store.update({ logInterval: DEFAULT_SETTINGS.logInterval });

		expect(listener).not.toHaveBeenCalled();
	});

	test("stops notifying after unsubscribe", () => {
		const store = new SettingsStore();
		const listener = vi.fn();
		const unsubscribe = store.subscribe(listener);

		unsubscribe();
		store.update({ writeGroups: true });

		expect(listener).not.toHaveBeenCalled();
	});
});
