/**
 * Stderr interception — forwards everything the process writes to stderr
 * as error messages, while still writing it to the real stream.
 *
 * relaylog's own stderr output (console echo, diagnostic loggers) runs under
 * suspendInterception(), so a failing endpoint never feeds its own failure
 * lines back into the queue.
 */

import { SEVERITY_MARKERS } from '@relaylog/sdk';

export interface ErrorSink {
	logError(text: string, origin: string): Promise<boolean>;
}

export interface InterceptOptions {
	/** Origin attached to forwarded lines (default: "stderr") */
	origin?: string;
	/** Stream to patch (default: process.stderr) */
	stream?: NodeJS.WritableStream;
}

type WriteCallback = (err?: Error | null) => void;

let suspendDepth = 0;

/**
 * Run fn with interception disabled. Nested calls are fine.
 */
export function suspendInterception<T>(fn: () => T): T {
	suspendDepth++;
	try {
		return fn();
	} finally {
		suspendDepth--;
	}
}

export function isInterceptionSuspended(): boolean {
	return suspendDepth > 0;
}

/**
 * Patch the stream's write() and return a function that restores it.
 * A trailing partial line is forwarded on restore.
 */
export function interceptStderr(sink: ErrorSink, options: InterceptOptions = {}): () => void {
	const stream = options.stream ?? process.stderr;
	const origin = options.origin ?? 'stderr';
	const originalWrite = stream.write;
	const passThrough = stream.write.bind(stream);
	let pending = '';

	const forward = (line: string): void => {
		const text = line.trim();
		if (!text || text.startsWith(SEVERITY_MARKERS.error)) return;
		// Forwarding echoes the error to stderr again; keep that out of the buffer
		suspendInterception(() => {
			void sink.logError(text, origin);
		});
	};

	const capture = (chunk: Uint8Array | string): void => {
		if (isInterceptionSuspended()) return;
		pending += typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf8');

		let newline = pending.indexOf('\n');
		while (newline !== -1) {
			forward(pending.slice(0, newline));
			pending = pending.slice(newline + 1);
			newline = pending.indexOf('\n');
		}
	};

	stream.write = (
		chunk: Uint8Array | string,
		encodingOrCb?: BufferEncoding | WriteCallback,
		cb?: WriteCallback,
	): boolean => {
		capture(chunk);
		if (typeof encodingOrCb === 'string' && typeof chunk === 'string') {
			return passThrough(chunk, encodingOrCb, cb);
		}
		return passThrough(chunk, typeof encodingOrCb === 'function' ? encodingOrCb : cb);
	};

	return () => {
		stream.write = originalWrite;
		if (pending) {
			forward(pending);
			pending = '';
		}
	};
}
