/**
 * Problem report file collection.
 *
 * @module reporting
 */

export {
	collectLogFilesToReport,
	collectPersistentFiles,
	MAX_REPORTED_DIRECTORIES,
} from "./collect.js";
export { type ReportFileCollector, ReportRegistry } from "./registry.js";
