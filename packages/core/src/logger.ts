/**
 * LoggerManager — fans diagnostic entries out to every registered logger.
 *
 * A logger that throws is reported through onError and never stops the
 * others or the pipeline.
 */

import type { LogEntry, Logger } from '@relaylog/sdk';
import { suspendInterception } from './stderr-interceptor.js';

export type LoggerErrorHandler = (loggerId: string, error: unknown) => void;

export class LoggerManager {
	private readonly loggers: Logger[] = [];
	private readonly onError?: LoggerErrorHandler;

	constructor(onError?: LoggerErrorHandler) {
		this.onError = onError;
	}

	addLogger(logger: Logger): void {
		this.loggers.push(logger);
	}

	get size(): number {
		return this.loggers.length;
	}

	async log(entry: LogEntry): Promise<void> {
		// Loggers write synchronously before their first await, so the
		// suspension covers the actual stderr writes.
		const pending = suspendInterception(() =>
			this.loggers.map((logger) => this.guard(logger, () => logger.log(entry))),
		);
		await Promise.all(pending);
	}

	async flush(): Promise<void> {
		await Promise.all(this.loggers.map((logger) => this.guard(logger, () => logger.flush())));
	}

	async shutdown(): Promise<void> {
		await Promise.all(this.loggers.map((logger) => this.guard(logger, () => logger.shutdown())));
	}

	private async guard(logger: Logger, fn: () => Promise<void>): Promise<void> {
		try {
			await fn();
		} catch (err) {
			this.onError?.(logger.id, err);
		}
	}
}
