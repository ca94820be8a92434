/**
 * Byte constants shared by every log file.
 *
 * @module serializer/format
 */

import { EOL } from "node:os";

/** XML declaration and `<LogFile>` opening tag. */
export const LOG_START_BYTES: Buffer = Buffer.from(
	`<?xml version="1.0" encoding="utf-8"?>${EOL}<LogFile>${EOL}`,
	"utf8",
);

/** Closing tag. No newline follows it. */
export const LOG_END_BYTES: Buffer = Buffer.from(`${EOL}</LogFile>`, "utf8");

/** Blank line placed between records, and before spliced content. */
export const ENTRY_SEPARATOR_BYTES: Buffer = Buffer.from(EOL + EOL, "utf8");

/** Comment written once a file reaches its size cap. */
export const SIZE_LIMIT_NOTICE_BYTES: Buffer = Buffer.from(
	"<!--Log file size limit reached-->",
	"utf8",
);
