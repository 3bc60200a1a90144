/**
 * Process shutdown hooks.
 *
 * SIGINT/SIGTERM get a cooperative flush before exiting. The 'exit' event
 * only allows synchronous work, so it gets the bounded forced flush.
 */

import type { EventEmitter } from 'node:events';
import { ConfigurationError } from './errors.js';
import type { Notifier } from './notifier.js';

export interface ShutdownHookOptions {
	/** Signals answered with a cooperative flush (default: SIGINT, SIGTERM) */
	signals?: NodeJS.Signals[];
	/** Called after the cooperative flush (default: process.exit) */
	exit?: (code: number) => void;
	/** Ceiling for the forced flush in the 'exit' handler */
	forcedFlushTimeoutMs?: number;
	/** Emitter the hooks attach to (default: process) */
	source?: EventEmitter;
}

const DEFAULT_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Install the hooks and return a function that removes them.
 */
export function installShutdownHooks(
	notifier: Notifier,
	options: ShutdownHookOptions = {},
): () => void {
	const source: EventEmitter = options.source ?? process;
	const exit = options.exit ?? ((code: number) => process.exit(code));
	const signals = options.signals ?? DEFAULT_SIGNALS;
	const ceilingMs = options.forcedFlushTimeoutMs;
	if (ceilingMs !== undefined && !(Number.isFinite(ceilingMs) && ceilingMs > 0)) {
		throw new ConfigurationError(
			'forcedFlushTimeoutMs',
			`forcedFlushTimeoutMs must be a positive number, got ${ceilingMs}`,
		);
	}
	let stopping = false;

	const onSignal = (): void => {
		// A second Ctrl-C while flushing should not start another flush
		if (stopping) return;
		stopping = true;
		notifier.flush().then(
			() => exit(0),
			() => exit(1),
		);
	};

	const onExit = (): void => {
		notifier.forcedFlush(ceilingMs);
	};

	for (const signal of signals) {
		source.on(signal, onSignal);
	}
	source.on('exit', onExit);

	return () => {
		for (const signal of signals) {
			source.off(signal, onSignal);
		}
		source.off('exit', onExit);
	};
}
