import { describe, expect, test } from "vitest";
import { captureStack, formatException } from "./stack.js";

describe("captureStack", () => {
	test("omits the synthetic error header", () => {
		const stack = captureStack();

		expect(stack.startsWith("Error")).toBe(false);
		expect(stack.split("\n")[0]).toMatch(/^at /);
	});

	test("drops frames above the boundary", () => {
		function outerMarker(): string {
			return innerMarker();
		}
		function innerMarker(): string {
			return captureStack(innerMarker);
		}

		const stack = outerMarker();
		expect(stack).not.toContain("innerMarker");
		expect(stack.split("\n")[0]).toContain("outerMarker");
	});
});

describe("formatException", () => {
	test("uses the stack of an error", () => {
		const error = new Error("boom");
		const text = formatException(error);

		expect(text.split("\n")[0]).toBe("Error: boom");
		expect(text).toBe(error.stack);
	});

	test("prepends the header when the stack lacks it", () => {
		const error = new Error("boom");
		error.stack = "at somewhere";

		expect(formatException(error)).toBe("Error: boom\nat somewhere");
	});

	test("stringifies other values", () => {
		expect(formatException("plain failure")).toBe("plain failure");
		expect(formatException(42)).toBe("42");
	});
});
