/**
 * Registry of report file collectors.
 *
 * @module reporting/registry
 */

import type { Logger } from "@logtape/logtape";
import { toError } from "../errors/index.js";
import { getDiagnosticsLogger } from "../logging/index.js";

/** Returns absolute paths of files to include in a report. */
export type ReportFileCollector = () => readonly string[];

/**
 * Collects report files from every registered source.
 *
 * A collector that throws is skipped so the rest of the report survives.
 */
export class ReportRegistry {
	private readonly collectors = new Set<ReportFileCollector>();
	private readonly diagnostics: Logger;

	constructor(diagnostics: Logger = getDiagnosticsLogger("reporting")) {
		this.diagnostics = diagnostics;
	}

	register(collector: ReportFileCollector): void {
		this.collectors.add(collector);
	}

	unregister(collector: ReportFileCollector): void {
		this.collectors.delete(collector);
	}

	/**
	 * Files from every collector in registration order, without duplicates.
	 */
	collect(): string[] {
		const files = new Set<string>();

		for (const collector of this.collectors) {
			try {
				for (const file of collector()) {
					files.add(file);
				}
			} catch (error) {
				this.diagnostics.warning("Report file collector failed: {message}", {
					message: toError(error).message,
				});
			}
		}

		return [...files];
	}
}
