/**
 * Markup escaping for the pseudo-XML log format.
 *
 * Record text lives inside comment sections so that arbitrary messages
 * cannot break the document. Each line after the first is re-opened with
 * its own `<!--\t\t-->` continuation, and any `-->` in the text is already
 * neutralised by escaping `>`.
 *
 * @example
 * ```ts
 * escapeMarkup("a < b & c"); // "a &lt; b &amp; c"
 * escapeCommentText("one\r\ntwo"); // "one\n<!--\t\t-->two"
 * ```
 */

const TEXT_ENTITIES: Record<string, string> = {
	"&": "&amp;",
	"<": "&lt;",
	">": "&gt;",
};

const ATTRIBUTE_ENTITIES: Record<string, string> = {
	...TEXT_ENTITIES,
	'"': "&quot;",
};

/**
 * Escape `&`, `<` and `>` with their entities.
 */
export function escapeMarkup(input: string): string {
	return input.replace(/[&<>]/g, (char) => TEXT_ENTITIES[char] ?? char);
}

/**
 * Escape a value for a double-quoted attribute.
 */
export function escapeAttribute(input: string): string {
	return input.replace(/[&<>"]/g, (char) => ATTRIBUTE_ENTITIES[char] ?? char);
}

/**
 * Normalize line endings to `\n`.
 */
export function normalizeLineEndings(input: string): string {
	return input.replace(/\r\n/g, "\n");
}

/** Prefix that re-opens a comment continuation on every new line. */
export const COMMENT_CONTINUATION = "<!--\t\t-->";

/**
 * Prepare free text for a comment section: normalize line endings, escape,
 * and re-open a comment continuation after every line break.
 */
export function escapeCommentText(input: string): string {
	return escapeMarkup(normalizeLineEndings(input)).replace(
		/\n/g,
		`\n${COMMENT_CONTINUATION}`,
	);
}
