/**
 * Formatters module - timestamps, directory names and message templates.
 *
 * @example
 * ```ts
 * import { formatDirectoryName, formatTemplate } from "../formatters/index.js";
 *
 * formatDirectoryName(new Date()); // "2026-10-19 12.00.00.000000"
 * formatTemplate("Loaded {} of {}", [3, 5]); // "Loaded 3 of 5"
 * ```
 */

export { formatTemplate } from "./template.js";
export {
	formatDirectoryName,
	formatLogTimestamp,
	parseDirectoryName,
} from "./time.js";
