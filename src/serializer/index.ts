/**
 * Serialization of records into the pseudo-XML log format.
 *
 * @module serializer
 */

export {
	createStream,
	joinEntries,
	type RenderBatchOptions,
	type RenderedBatch,
	type RenderedStream,
	renderBatch,
} from "./batch.js";
export {
	ENTRY_SEPARATOR_BYTES,
	LOG_END_BYTES,
	LOG_START_BYTES,
	SIZE_LIMIT_NOTICE_BYTES,
} from "./format.js";
