import { describe, expect, test } from "vitest";
import {
	escapeAttribute,
	escapeCommentText,
	escapeMarkup,
	normalizeLineEndings,
} from "./index.js";

describe("escapeMarkup", () => {
	test("escapes ampersands and angle brackets", () => {
		expect(escapeMarkup("a < b & c > d")).toBe("a &lt; b &amp; c &gt; d");
	});

	test("leaves quotes alone", () => {
		expect(escapeMarkup(`say "hi"`)).toBe(`say "hi"`);
	});
});

describe("escapeAttribute", () => {
	test("also escapes double quotes", () => {
		expect(escapeAttribute(`a"b<c`)).toBe("a&quot;b&lt;c");
	});
});

describe("normalizeLineEndings", () => {
	test("turns CRLF into LF", () => {
		expect(normalizeLineEndings("a\r\nb\nc")).toBe("a\nb\nc");
	});
});

describe("escapeCommentText", () => {
	test("re-opens a comment after each line break", () => {
		expect(escapeCommentText("one\r\ntwo\nthree")).toBe(
			"one\n<!--\t\t-->two\n<!--\t\t-->three",
		);
	});

	test("neutralises comment terminators in the text", () => {
		expect(escapeCommentText("--> <!--")).toBe("--&gt; &lt;!--");
	});
});
