import { describe, expect, test } from "vitest";
import { ReportRegistry } from "./registry.js";

describe("ReportRegistry", () => {
	test("merges collectors in registration order without duplicates", () => {
		const registry = new ReportRegistry();
		registry.register(() => ["/logs/Latest.xml", "/logs/a/Log.xml"]);
		registry.register(() => ["/logs/Latest.xml", "/data/settings.json"]);

		expect(registry.collect()).toEqual([
			"/logs/Latest.xml",
			"/logs/a/Log.xml",
			"/data/settings.json",
		]);
	});

	test("skips a collector that throws", () => {
		const registry = new ReportRegistry();
		registry.register(() => {
			throw new Error("unreadable");
		});
		registry.register(() => ["/logs/Latest.xml"]);

		expect(registry.collect()).toEqual(["/logs/Latest.xml"]);
	});

	test("forgets unregistered collectors", () => {
		const registry = new ReportRegistry();
		const collector = () => ["/logs/Latest.xml"];
		registry.register(collector);
		registry.unregister(collector);

		expect(registry.collect()).toEqual([]);
	});
});
