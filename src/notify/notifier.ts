/**
 * One-time user notification for write failures.
 *
 * @module notify/notifier
 */

import type { Logger } from "@logtape/logtape";
import { toError } from "../errors/index.js";
import { formatTemplate } from "../formatters/index.js";
import { getDiagnosticsLogger } from "../logging/index.js";
import { formatException } from "../record/index.js";

/**
 * Resolves user-facing strings. Returning `undefined` selects the built-in
 * English text.
 */
export interface Localizer {
	getString(key: string, ...tokens: string[]): string | undefined;
}

export interface NotificationContent {
	readonly title: string;
	readonly text: string;
}

/**
 * Host surface that displays a notification.
 */
export interface WriteFailureNotifier {
	show(content: NotificationContent): void;
}

export const WRITE_FAILURE_TITLE_KEY = "Write_Failure_Notification.Title";
export const WRITE_FAILURE_TEXT_KEY = "Write_Failure_Notification.Text";

const DEFAULT_STRINGS: Readonly<Record<string, string>> = {
	[WRITE_FAILURE_TITLE_KEY]: "Debug logging failed",
	[WRITE_FAILURE_TEXT_KEY]:
		"Debug logs could not be written to disk. Some reports may have been lost.\n\n{0}",
};

export interface OnceNotifierOptions {
	/** Prefix for localization keys, e.g. "Hearthlog". */
	readonly namespace: string;
	readonly notifier: WriteFailureNotifier;
	readonly localizer?: Localizer;
	readonly diagnostics?: Logger;
}

/**
 * Forwards the write-failure notification to the host at most once.
 */
export class OnceNotifier {
	private shown = false;
	private readonly namespace: string;
	private readonly notifier: WriteFailureNotifier;
	private readonly localizer: Localizer | undefined;
	private readonly diagnostics: Logger;

	constructor(options: OnceNotifierOptions) {
		this.namespace = options.namespace;
		this.notifier = options.notifier;
		this.localizer = options.localizer;
		this.diagnostics = options.diagnostics ?? getDiagnosticsLogger("notify");
	}

	get hasShown(): boolean {
		return this.shown;
	}

	/**
	 * Show the notification for `exception` unless one was already shown.
	 *
	 * @returns Whether the host was asked to show it
	 */
	notify(exception: unknown): boolean {
		if (this.shown) return false;
		this.shown = true;

		const details = formatException(exception);
		const content: NotificationContent = {
			title: this.resolve(WRITE_FAILURE_TITLE_KEY),
			text: this.resolve(WRITE_FAILURE_TEXT_KEY, details),
		};

		try {
			this.notifier.show(content);
		} catch (error) {
			this.diagnostics.error("Failed to show the write failure notification: {message}", {
				message: toError(error).message,
			});
		}
		return true;
	}

	private resolve(key: string, ...tokens: string[]): string {
		const localized = this.localizer?.getString(`${this.namespace}.${key}`, ...tokens);
		if (localized !== undefined) return localized;
		return formatTemplate(DEFAULT_STRINGS[key] ?? key, tokens);
	}
}
