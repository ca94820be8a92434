/**
 * Call-stack and exception text capture.
 *
 * @module record/stack
 */

/**
 * Any function usable as a stack-capture boundary.
 */
export type StackBoundary = (...args: never[]) => unknown;

/**
 * Capture the current call stack as text, one frame per line.
 *
 * Frames above and including `boundary` are omitted, so passing the public
 * entry point a caller used hides the logging machinery from the trace.
 *
 * @param boundary - Function whose frame (and everything above it) is dropped
 * @returns Stack frames joined by `\n`, or an empty string when unavailable
 */
export function captureStack(boundary?: StackBoundary): string {
	const holder: { stack?: string } = {};
	Error.captureStackTrace(holder, boundary ?? captureStack);

	const stack = holder.stack ?? "";
	// The first line is the "Error" header of the synthetic holder
	return stack
		.split("\n")
		.slice(1)
		.map((line) => line.trim())
		.join("\n");
}

/**
 * Render a captured exception as type, message and traceback text.
 */
export function formatException(exception: unknown): string {
	if (exception instanceof Error) {
		const header = `${exception.name}: ${exception.message}`;
		const stack = exception.stack ?? header;
		return stack.startsWith(header) ? stack : `${header}\n${stack}`;
	}
	return String(exception);
}
