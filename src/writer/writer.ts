/**
 * Append-or-create writer for log directories.
 *
 * A first write creates a file as start marker + payload + end marker. Later
 * writes verify the file, then overwrite its end marker with separator +
 * payload + end marker, so earlier content is never rewritten. `Latest.xml`
 * mirrors the chronological stream and falls back to a full copy when it
 * cannot be spliced.
 *
 * Size cap: when a write would bring a file to the cap or past it, only the
 * whole records that fit are kept, the size-limit notice is added, and the
 * file is closed to further appends for the life of this writer.
 *
 * @module writer/writer
 */

import type { Logger } from "@logtape/logtape";
import { toError } from "../errors/index.js";
import {
	copyFileSync,
	ensureDirSync,
	getFileSizeSync,
	overwriteTailSync,
	pathExistsSync,
	writeBinaryFileSync,
	writeTextFileIfMissingSync,
} from "../fs/index.js";
import { getDiagnosticsLogger } from "../logging/index.js";
import {
	ENTRY_SEPARATOR_BYTES,
	joinEntries,
	LOG_END_BYTES,
	LOG_START_BYTES,
	type RenderedBatch,
	type RenderedStream,
	SIZE_LIMIT_NOTICE_BYTES,
} from "../serializer/index.js";
import { verifyLogFile } from "../verify/index.js";
import {
	type LogDirectoryPaths,
	resolveGroupFilePath,
	resolveLogDirectoryPaths,
} from "./paths.js";

/**
 * Everything needed to write one rendered batch.
 */
export interface WriteRequest {
	readonly rootPath: string;
	readonly directoryName: string;
	/** Written to `Session.txt` when the directory has none yet. */
	readonly sessionInformation: string;
	/** Written to `Mods Directory.txt` when the directory has none yet. */
	readonly modsInformation: string;
	readonly writeChronological: boolean;
	readonly writeGroups: boolean;
	/** Per-file cap in bytes. Negative means unlimited. */
	readonly sizeLimitBytes: number;
	readonly batch: RenderedBatch;
}

/**
 * Result of a write. Failures are values, never exceptions.
 */
export type WriteOutcome =
	| { readonly status: "written" }
	| {
			readonly status: "written-with-truncation";
			/** Files that reached their cap during this write. */
			readonly truncatedFiles: readonly string[];
	  }
	| { readonly status: "failed"; readonly reason: Error };

/**
 * Capability the engine writes through. Tests substitute fakes.
 */
export interface LogWriter {
	write(request: WriteRequest): WriteOutcome;
}

type StreamWrite =
	| { readonly kind: "created"; readonly payload: Buffer; readonly truncated: boolean }
	| { readonly kind: "appended"; readonly payload: Buffer; readonly truncated: boolean }
	| { readonly kind: "skipped" };

interface FittedPayload {
	readonly payload: Buffer;
	readonly truncated: boolean;
}

/**
 * Choose the payload to write given the bytes the file will hold besides it.
 *
 * @param overhead - Bytes in the finished file other than the payload
 */
export function fitPayload(
	stream: RenderedStream,
	overhead: number,
	sizeLimitBytes: number,
): FittedPayload {
	if (sizeLimitBytes < 0 || overhead + stream.bytes.length < sizeLimitBytes) {
		return { payload: stream.bytes, truncated: false };
	}

	const kept: Buffer[] = [];
	let keptLength = 0;
	for (const entry of stream.entries) {
		const separator = kept.length > 0 ? ENTRY_SEPARATOR_BYTES.length : 0;
		const nextLength = keptLength + separator + entry.length;
		if (overhead + nextLength > sizeLimitBytes) break;
		kept.push(entry);
		keptLength = nextLength;
	}

	return {
		payload: Buffer.concat([joinEntries(kept), SIZE_LIMIT_NOTICE_BYTES]),
		truncated: true,
	};
}

/**
 * Filesystem-backed {@link LogWriter}.
 */
export class LogFileWriter implements LogWriter {
	private readonly cappedFiles = new Set<string>();
	private readonly diagnostics: Logger;

	constructor(diagnostics: Logger = getDiagnosticsLogger("writer")) {
		this.diagnostics = diagnostics;
	}

	/**
	 * Whether a file has reached its cap and is closed to appends.
	 */
	isCapped(filePath: string): boolean {
		return this.cappedFiles.has(filePath);
	}

	write(request: WriteRequest): WriteOutcome {
		const truncatedFiles: string[] = [];

		try {
			this.writeBatch(request, truncatedFiles);
		} catch (error) {
			const reason = toError(error);
			this.diagnostics.warn("Log write failed: {message}", {
				message: reason.message,
				directoryName: request.directoryName,
			});
			return { status: "failed", reason };
		}

		if (truncatedFiles.length > 0) {
			return { status: "written-with-truncation", truncatedFiles };
		}
		return { status: "written" };
	}

	private writeBatch(request: WriteRequest, truncatedFiles: string[]): void {
		const { batch, writeChronological, writeGroups, sizeLimitBytes } = request;

		const chronological = writeChronological ? batch.chronological : null;
		const groups = writeGroups ? batch.groups : new Map<string, RenderedStream>();

		if (chronological === null && groups.size === 0) {
			return;
		}

		const paths = resolveLogDirectoryPaths(request.rootPath, request.directoryName);

		ensureDirSync(paths.directory);
		if (writeGroups) {
			ensureDirSync(paths.groups);
		}

		writeTextFileIfMissingSync(paths.session, request.sessionInformation);
		writeTextFileIfMissingSync(paths.mods, request.modsInformation);

		if (chronological !== null) {
			const result = this.writeStream(paths.chronological, chronological, sizeLimitBytes);
			if (result.kind !== "skipped") {
				if (result.truncated) truncatedFiles.push(paths.chronological);
				this.mirrorLatest(paths, result);
			}
		}

		for (const [group, stream] of groups) {
			const groupPath = resolveGroupFilePath(paths, group);
			const result = this.writeStream(groupPath, stream, sizeLimitBytes);
			if (result.kind !== "skipped" && result.truncated) {
				truncatedFiles.push(groupPath);
			}
		}
	}

	private writeStream(
		filePath: string,
		stream: RenderedStream,
		sizeLimitBytes: number,
	): StreamWrite {
		if (this.cappedFiles.has(filePath)) {
			return { kind: "skipped" };
		}

		if (!pathExistsSync(filePath)) {
			const { payload, truncated } = fitPayload(
				stream,
				LOG_START_BYTES.length + LOG_END_BYTES.length,
				sizeLimitBytes,
			);
			writeBinaryFileSync(filePath, LOG_START_BYTES, payload, LOG_END_BYTES);
			if (truncated) this.markCapped(filePath);
			return { kind: "created", payload, truncated };
		}

		verifyLogFile(filePath);

		const size = getFileSizeSync(filePath);
		if (sizeLimitBytes >= 0 && size >= sizeLimitBytes) {
			this.markCapped(filePath);
			return { kind: "skipped" };
		}

		const { payload, truncated } = fitPayload(
			stream,
			size + ENTRY_SEPARATOR_BYTES.length,
			sizeLimitBytes,
		);
		overwriteTailSync(
			filePath,
			LOG_END_BYTES.length,
			ENTRY_SEPARATOR_BYTES,
			payload,
			LOG_END_BYTES,
		);
		if (truncated) this.markCapped(filePath);
		return { kind: "appended", payload, truncated };
	}

	private mirrorLatest(
		paths: LogDirectoryPaths,
		result: Exclude<StreamWrite, { kind: "skipped" }>,
	): void {
		if (result.kind === "created") {
			writeBinaryFileSync(paths.latest, LOG_START_BYTES, result.payload, LOG_END_BYTES);
			return;
		}

		try {
			verifyLogFile(paths.latest);
			overwriteTailSync(
				paths.latest,
				LOG_END_BYTES.length,
				ENTRY_SEPARATOR_BYTES,
				result.payload,
				LOG_END_BYTES,
			);
		} catch (error) {
			this.diagnostics.debug("Replacing Latest.xml with a copy of {source}: {message}", {
				source: paths.chronological,
				message: toError(error).message,
			});
			copyFileSync(paths.chronological, paths.latest);
		}
	}

	private markCapped(filePath: string): void {
		this.cappedFiles.add(filePath);
		this.diagnostics.info("Log file {filePath} reached its size limit", { filePath });
	}
}
