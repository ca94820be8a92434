/**
 * Batch serialization into the chronological and per-group streams.
 *
 * @module serializer/batch
 */

import { type LogRecord, renderRecord } from "../record/index.js";
import { ENTRY_SEPARATOR_BYTES } from "./format.js";

/**
 * Rendered records destined for one file.
 */
export interface RenderedStream {
	/** Each record's bytes, in order. */
	readonly entries: readonly Buffer[];
	/** Entries joined with the blank-line separator. */
	readonly bytes: Buffer;
}

/**
 * Output of rendering one flush worth of records.
 */
export interface RenderedBatch {
	/** Null when chronological writing is off or nothing was rendered. */
	readonly chronological: RenderedStream | null;
	/** Group name to stream. Empty when group writing is off. */
	readonly groups: ReadonlyMap<string, RenderedStream>;
}

export interface RenderBatchOptions {
	/** Written as `WriteTime` on every record. */
	writeTime?: string;
	/** Produce the chronological stream (default true). */
	chronological?: boolean;
	/** Produce the per-group streams (default true). */
	groups?: boolean;
}

/**
 * Join entries with the blank-line separator.
 */
export function joinEntries(entries: readonly Buffer[]): Buffer {
	const parts: Buffer[] = [];
	entries.forEach((entry, index) => {
		if (index > 0) parts.push(ENTRY_SEPARATOR_BYTES);
		parts.push(entry);
	});
	return Buffer.concat(parts);
}

/**
 * Build a stream from already rendered entries.
 */
export function createStream(entries: readonly Buffer[]): RenderedStream {
	return { entries, bytes: joinEntries(entries) };
}

/**
 * Render records into a chronological blob and one blob per group.
 *
 * Each record is rendered once and shared between the two views.
 *
 * @example
 * ```typescript
 * const batch = renderBatch(records, { writeTime: "2026-10-19T12:00:00.000000" });
 * batch.chronological?.bytes; // every record
 * batch.groups.get("Loader")?.bytes; // records whose group is "Loader"
 * ```
 */
export function renderBatch(
	records: readonly LogRecord[],
	options: RenderBatchOptions = {},
): RenderedBatch {
	const { writeTime, chronological = true, groups = true } = options;

	const chronologicalEntries: Buffer[] = [];
	const groupEntries = new Map<string, Buffer[]>();

	if (chronological || groups) {
		for (const record of records) {
			const bytes = renderRecord(record, writeTime);

			if (chronological) {
				chronologicalEntries.push(bytes);
			}

			if (groups) {
				const entries = groupEntries.get(record.group);
				if (entries) {
					entries.push(bytes);
				} else {
					groupEntries.set(record.group, [bytes]);
				}
			}
		}
	}

	const groupStreams = new Map<string, RenderedStream>();
	for (const [group, entries] of groupEntries) {
		groupStreams.set(group, createStream(entries));
	}

	return {
		chronological:
			chronologicalEntries.length > 0 ? createStream(chronologicalEntries) : null,
		groups: groupStreams,
	};
}
