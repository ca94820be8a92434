/**
 * Periodic flushing.
 *
 * @module scheduler
 */

export { FlushTicker, type TickCallback } from "./ticker.js";
