/**
 * Logging service.
 *
 * @module service
 */

export { LoggerService, type LoggerServiceOptions } from "./service.js";
