/**
 * Write-failure notification.
 *
 * @module notify
 */

export {
	type Localizer,
	type NotificationContent,
	OnceNotifier,
	type OnceNotifierOptions,
	WRITE_FAILURE_TEXT_KEY,
	WRITE_FAILURE_TITLE_KEY,
	type WriteFailureNotifier,
} from "./notifier.js";
