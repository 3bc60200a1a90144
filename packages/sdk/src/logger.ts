/**
 * Logger interface — passive observers of the delivery pipeline.
 *
 * Loggers receive LogEntry records for every phase:
 * enqueue, delivery attempts, rate-limit retries, flushes.
 */

import type { LogEntry, LogLevel, LogPhase } from './types.js';

/**
 * Logger interface.
 *
 * Implement this to create a new diagnostic destination.
 * Loggers are called for every pipeline event — they should be fast.
 */
export interface Logger {
	/** Unique logger ID */
	readonly id: string;

	/** Initialize with config */
	init(config: Record<string, unknown>): Promise<void>;

	/**
	 * Called for every pipeline event.
	 * Should not throw — log errors should be handled internally.
	 */
	log(entry: LogEntry): Promise<void>;

	/** Flush any buffered entries */
	flush(): Promise<void>;

	/** Clean shutdown (flush + close) */
	shutdown(): Promise<void>;
}

/**
 * Logger registration — what a logger package exports.
 */
export interface LoggerRegistration {
	/** Unique logger ID */
	id: string;
	/** Logger class */
	logger: new () => Logger;
	/** JSON Schema for config validation */
	configSchema?: Record<string, unknown>;
}

/** Level at which each phase is reported. */
export const PHASE_LEVELS: Readonly<Record<LogPhase, LogLevel>> = {
	'system.start': 'info',
	'system.stop': 'info',
	'system.error': 'error',
	'message.enqueue': 'debug',
	'deliver.attempt': 'debug',
	'deliver.success': 'info',
	'deliver.retry': 'warn',
	'deliver.failure': 'error',
	'dispatch.idle': 'debug',
	'flush.start': 'info',
	'flush.complete': 'info',
	'flush.timeout': 'warn',
};
