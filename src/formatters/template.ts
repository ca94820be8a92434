/**
 * Positional message templates.
 *
 * `{}` takes the next argument, `{N}` takes argument N, and `{{` / `}}` are
 * literal braces. Automatic and explicit numbering cannot be mixed.
 *
 * @module formatters/template
 */

import { StructuredError } from "../errors/index.js";

function templateError(template: string, problem: string): StructuredError {
	return new StructuredError(
		`Invalid message template: ${problem}.`,
		"VALIDATION",
		"INVALID_TEMPLATE",
		false,
		{ template },
	);
}

/**
 * Substitute positional arguments into a template.
 *
 * @example
 * ```ts
 * formatTemplate("Loaded {} of {}", [3, 5]); // "Loaded 3 of 5"
 * formatTemplate("{1} before {0}", ["b", "a"]); // "a before b"
 * formatTemplate("{{literal}}", []); // "{literal}"
 * ```
 *
 * @throws StructuredError (VALIDATION) on malformed fields or missing arguments
 */
export function formatTemplate(template: string, args: readonly unknown[]): string {
	let output = "";
	let nextAutomatic = 0;
	let numbering: "automatic" | "explicit" | undefined;
	let index = 0;

	while (index < template.length) {
		const char = template.charAt(index);

		if (char === "}") {
			if (template.charAt(index + 1) !== "}") {
				throw templateError(template, "single '}' encountered");
			}
			output += "}";
			index += 2;
			continue;
		}

		if (char !== "{") {
			output += char;
			index += 1;
			continue;
		}

		if (template.charAt(index + 1) === "{") {
			output += "{";
			index += 2;
			continue;
		}

		const close = template.indexOf("}", index + 1);
		if (close === -1) {
			throw templateError(template, "single '{' encountered");
		}

		const field = template.slice(index + 1, close);
		let position: number;

		if (field === "") {
			if (numbering === "explicit") {
				throw templateError(template, "cannot switch from explicit to automatic numbering");
			}
			numbering = "automatic";
			position = nextAutomatic;
			nextAutomatic += 1;
		} else if (/^\d+$/.test(field)) {
			if (numbering === "automatic") {
				throw templateError(template, "cannot switch from automatic to explicit numbering");
			}
			numbering = "explicit";
			position = Number(field);
		} else {
			throw templateError(template, `unsupported field '{${field}}'`);
		}

		if (position >= args.length) {
			throw templateError(template, `no argument for position ${position}`);
		}

		output += String(args[position]);
		index = close + 1;
	}

	return output;
}
