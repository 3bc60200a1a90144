/**
 * Notifier — one outbound notification channel.
 *
 * Library-first API:
 *   const notifier = new Notifier({ transport });
 *   const delivered = await notifier.logInfo('sync finished', 'clan-sync');
 *   await notifier.shutdown();
 *
 * Create one per process and pass it to whatever needs to report.
 */

import { EventEmitter } from 'node:events';
import type {
	LogEntry,
	LogPhase,
	Logger,
	OutboundMessage,
	Severity,
	Transport,
} from '@relaylog/sdk';
import { formatMessage, generateMessageId } from '@relaylog/sdk';
import { Dispatcher, type DispatcherState, type Sleep } from './dispatcher.js';
import { ConfigurationError } from './errors.js';
import {
	DEFAULT_FLUSH_POLL_INTERVAL_MS,
	DEFAULT_FORCED_FLUSH_TIMEOUT_MS,
	waitForDrain,
	waitForDrainSync,
} from './flush.js';
import { LoggerManager } from './logger.js';
import { MessageQueue, type QueuedEntry } from './queue.js';
import { suspendInterception } from './stderr-interceptor.js';

// ─── Options ──────────────────────────────────────────────────────────────────

export interface NotifierOptions {
	transport: Transport;
	/** User mentioned in front of every error message */
	escalationTarget?: string;
	/** Diagnostic loggers, already initialized */
	loggers?: Logger[];
	/** Mirror each formatted line to the local console (default: true) */
	echo?: boolean;
	/** Poll interval of flush() (default: 100) */
	flushPollIntervalMs?: number;
	/** Ceiling of forcedFlush() when none is passed (default: 5000) */
	forcedFlushTimeoutMs?: number;
	/** Wait used between rate-limited attempts */
	sleep?: Sleep;
	/** Clock used for message timestamps */
	now?: () => Date;
}

export interface NotifierStatus {
	state: DispatcherState;
	/** Messages queued behind the one in flight */
	pending: number;
	/** ID of the message being sent, if any */
	in_flight: string | null;
	delivered: number;
	failed: number;
	rate_limited: number;
}

// ─── Events ───────────────────────────────────────────────────────────────────

export interface NotifierEvents {
	delivery: [{ message: OutboundMessage; delivered: boolean; attempts: number }];
	rate_limited: [{ message: OutboundMessage; attempt: number; retryAfterMs: number }];
	error: [Error];
}

// ─── Notifier ─────────────────────────────────────────────────────────────────

export class Notifier extends EventEmitter {
	private readonly transport: Transport;
	private readonly escalationTarget?: string;
	private readonly echo: boolean;
	private readonly flushPollIntervalMs: number;
	private readonly forcedFlushTimeoutMs: number;
	private readonly now: () => Date;
	private readonly queue = new MessageQueue<QueuedEntry>();
	private readonly dispatcher: Dispatcher;
	private readonly loggerManager: LoggerManager;
	private readonly counters = { delivered: 0, failed: 0, rate_limited: 0 };

	constructor(options: NotifierOptions) {
		super();
		this.transport = options.transport;
		this.escalationTarget = options.escalationTarget || undefined;
		this.echo = options.echo ?? true;
		this.flushPollIntervalMs = positive(
			'flushPollIntervalMs',
			options.flushPollIntervalMs ?? DEFAULT_FLUSH_POLL_INTERVAL_MS,
		);
		this.forcedFlushTimeoutMs = positive(
			'forcedFlushTimeoutMs',
			options.forcedFlushTimeoutMs ?? DEFAULT_FORCED_FLUSH_TIMEOUT_MS,
		);
		this.now = options.now ?? (() => new Date());

		this.loggerManager = new LoggerManager((loggerId, err) => {
			this.reportError(new Error(`Logger "${loggerId}" failed: ${errorMessage(err)}`));
		});
		for (const logger of options.loggers ?? []) {
			this.loggerManager.addLogger(logger);
		}

		this.dispatcher = new Dispatcher({
			queue: this.queue,
			transport: this.transport,
			sleep: options.sleep,
			hooks: {
				onAttempt: (message, attempt) => {
					this.emitLog('deliver.attempt', message, { attempt });
				},
				onDelivered: (message, attempt, durationMs) => {
					this.counters.delivered++;
					this.emitLog('deliver.success', message, {
						attempt,
						duration_ms: durationMs,
						result: 'delivered',
					});
					this.emitEvent('delivery', { message, delivered: true, attempts: attempt });
				},
				onRateLimited: (message, attempt, outcome, durationMs) => {
					this.counters.rate_limited++;
					this.emitLog('deliver.retry', message, {
						attempt,
						delay_ms: outcome.retryAfterMs,
						duration_ms: durationMs,
						http_status: 429,
						result: 'rate_limited',
						error: outcome.error?.message,
					});
					this.emitEvent('rate_limited', {
						message,
						attempt,
						retryAfterMs: outcome.retryAfterMs,
					});
				},
				onFailed: (message, attempt, outcome, durationMs) => {
					this.counters.failed++;
					this.emitLog('deliver.failure', message, {
						attempt,
						duration_ms: durationMs,
						http_status: outcome.httpStatus,
						result: 'failed',
						error: outcome.error.message,
					});
					this.emitEvent('delivery', { message, delivered: false, attempts: attempt });
				},
				onIdle: () => {
					this.emitLog('dispatch.idle', undefined, {});
				},
				onFault: (err, message) => {
					this.emitLog('system.error', message, { error: errorMessage(err) });
					this.reportError(err instanceof Error ? err : new Error(String(err)));
				},
			},
		});

		this.emitLog('system.start', undefined, { result: 'ready' });
	}

	// ─── Producer API ─────────────────────────────────────────────────────────

	log(text: string, origin: string): Promise<boolean> {
		return this.enqueue('log', text, origin);
	}

	logInfo(text: string, origin: string): Promise<boolean> {
		return this.enqueue('info', text, origin);
	}

	logSuccess(text: string, origin: string): Promise<boolean> {
		return this.enqueue('success', text, origin);
	}

	logWarning(text: string, origin: string): Promise<boolean> {
		return this.enqueue('warning', text, origin);
	}

	logError(text: string, origin: string): Promise<boolean> {
		return this.enqueue('error', text, origin);
	}

	/**
	 * Format and queue a message. Returns at once; the promise settles with
	 * whether the endpoint accepted it and never rejects.
	 */
	enqueue(severity: Severity, text: string, origin: string): Promise<boolean> {
		const message: OutboundMessage = Object.freeze({
			id: generateMessageId(),
			text: formatMessage(severity, text, origin, {
				escalationTarget: this.escalationTarget,
				now: this.now(),
			}),
			severity,
			origin,
			submittedAt: Date.now(),
		});

		if (this.echo) this.echoLine(message);

		const handle = new Promise<boolean>((resolve) => {
			this.queue.push({ message, resolve });
		});
		this.emitLog('message.enqueue', message, {});
		this.dispatcher.kick();
		return handle;
	}

	// ─── Flush & shutdown ─────────────────────────────────────────────────────

	/** Queue empty and no drain running */
	get isDrained(): boolean {
		return this.queue.isEmpty && this.dispatcher.state === 'idle';
	}

	/**
	 * Wait until every queued message has an outcome. No upper bound.
	 */
	async flush(): Promise<void> {
		if (this.isDrained) return;
		const startTime = Date.now();
		this.emitLog('flush.start', undefined, { metadata: { mode: 'cooperative' } });
		await waitForDrain(() => this.isDrained, this.flushPollIntervalMs);
		this.emitLog('flush.complete', undefined, { duration_ms: Date.now() - startTime });
	}

	/**
	 * Block without yielding until drained or the ceiling elapses.
	 * Returns false when messages were still pending at the ceiling.
	 */
	forcedFlush(ceilingMs = this.forcedFlushTimeoutMs): boolean {
		positive('ceilingMs', ceilingMs);
		if (this.isDrained) return true;
		const startTime = Date.now();
		this.emitLog('flush.start', undefined, {
			metadata: { mode: 'forced', ceiling_ms: ceilingMs },
		});

		const drained = waitForDrainSync(() => this.isDrained, ceilingMs);
		this.emitLog(drained ? 'flush.complete' : 'flush.timeout', undefined, {
			duration_ms: Date.now() - startTime,
		});
		return drained;
	}

	/**
	 * Flush, then release the transport and loggers.
	 */
	async shutdown(): Promise<void> {
		await this.flush();
		this.emitLog('system.stop', undefined, { result: 'stopped' });
		await this.transport.shutdown();
		await this.loggerManager.flush();
		await this.loggerManager.shutdown();
	}

	status(): NotifierStatus {
		return {
			state: this.dispatcher.state,
			pending: this.queue.size,
			in_flight: this.dispatcher.inFlight?.id ?? null,
			...this.counters,
		};
	}

	/** Get the logger manager (for adding loggers externally) */
	get loggers(): LoggerManager {
		return this.loggerManager;
	}

	// ─── Internal ─────────────────────────────────────────────────────────────

	private echoLine(message: OutboundMessage): void {
		suspendInterception(() => {
			if (message.severity === 'error') console.error(message.text);
			else if (message.severity === 'warning') console.warn(message.text);
			else console.log(message.text);
		});
	}

	private reportError(error: Error): void {
		// An 'error' event without listeners would throw inside the drain loop
		if (this.listenerCount('error') > 0) this.emitEvent('error', error);
	}

	private emitEvent<K extends keyof NotifierEvents>(event: K, ...args: NotifierEvents[K]): void {
		this.emit(event, ...args);
	}

	private emitLog(
		phase: LogPhase,
		message: OutboundMessage | undefined,
		fields: Partial<LogEntry>,
	): void {
		if (this.loggerManager.size === 0) return;
		const entry: LogEntry = {
			timestamp: new Date().toISOString(),
			phase,
			message_id: message?.id,
			origin: message?.origin,
			severity: message?.severity,
			transport: this.transport.id,
			queue_depth: this.queue.size,
			...fields,
		};
		void this.loggerManager.log(entry);
	}
}

function positive(field: string, value: number): number {
	if (!Number.isFinite(value) || value <= 0) {
		throw new ConfigurationError(field, `${field} must be a positive number, got ${value}`);
	}
	return value;
}

function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
