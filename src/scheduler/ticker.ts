/**
 * Repeating flush timer.
 *
 * At most one timer is live per ticker: `start` always stops the previous
 * one first. The timer is unref'd so it never keeps the process alive.
 *
 * @module scheduler/ticker
 */

export type TickCallback = () => void;

export class FlushTicker {
	private timer: ReturnType<typeof setInterval> | undefined;
	private seconds: number | undefined;

	get isRunning(): boolean {
		return this.timer !== undefined;
	}

	/** Interval of the live timer, in seconds. */
	get intervalSeconds(): number | undefined {
		return this.seconds;
	}

	/**
	 * Run `callback` every `seconds`, replacing any live timer.
	 *
	 * @throws RangeError when `seconds` is not a positive finite number
	 */
	start(seconds: number, callback: TickCallback): void {
		if (!Number.isFinite(seconds) || seconds <= 0) {
			throw new RangeError(`Flush interval must be a positive number of seconds, got ${seconds}`);
		}

		this.stop();

		const timer = setInterval(callback, seconds * 1000);
		timer.unref();
		this.timer = timer;
		this.seconds = seconds;
	}

	stop(): void {
		if (this.timer !== undefined) {
			clearInterval(this.timer);
			this.timer = undefined;
			this.seconds = undefined;
		}
	}
}
