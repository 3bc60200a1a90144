/**
 * Dispatcher — the single logical consumer of a MessageQueue.
 *
 * State machine:
 *   idle ──kick()──► draining ──queue observed empty──► idle
 *
 * kick() claims the draining state in one synchronous step, so at most one
 * drain loop, and therefore at most one transport call, is ever active for
 * a queue. A rate-limited message is retried after the requested delay
 * without advancing the queue; a failed message is resolved false and the
 * next one is attempted immediately.
 *
 * Hooks observe outcomes but never change them: a hook that throws is
 * reported through onFault and the message keeps the result of its send.
 */

import type {
	FailedOutcome,
	OutboundMessage,
	RateLimitedOutcome,
	SendOutcome,
	Transport,
} from '@relaylog/sdk';
import type { MessageQueue, QueuedEntry } from './queue.js';

export type DispatcherState = 'idle' | 'draining';

export type Sleep = (ms: number) => Promise<void>;

export interface DispatcherHooks {
	onAttempt?(message: OutboundMessage, attempt: number): void;
	onDelivered?(message: OutboundMessage, attempt: number, durationMs: number): void;
	onRateLimited?(
		message: OutboundMessage,
		attempt: number,
		outcome: RateLimitedOutcome,
		durationMs: number,
	): void;
	onFailed?(
		message: OutboundMessage,
		attempt: number,
		outcome: FailedOutcome,
		durationMs: number,
	): void;
	onIdle?(): void;
	/** A hook threw; the message, when there is one, keeps its outcome */
	onFault?(error: unknown, message?: OutboundMessage): void;
}

export interface DispatcherOptions {
	queue: MessageQueue<QueuedEntry>;
	transport: Transport;
	/** Wait used between rate-limited attempts */
	sleep?: Sleep;
	hooks?: DispatcherHooks;
}

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export class Dispatcher {
	private readonly queue: MessageQueue<QueuedEntry>;
	private readonly transport: Transport;
	private readonly sleep: Sleep;
	private readonly hooks: DispatcherHooks;
	private current: DispatcherState = 'idle';
	private active: OutboundMessage | null = null;

	constructor(options: DispatcherOptions) {
		this.queue = options.queue;
		this.transport = options.transport;
		this.sleep = options.sleep ?? defaultSleep;
		this.hooks = options.hooks ?? {};
	}

	get state(): DispatcherState {
		return this.current;
	}

	/** Message currently being sent or waiting out a rate limit */
	get inFlight(): OutboundMessage | null {
		return this.active;
	}

	/**
	 * Start draining unless a drain is already running. A losing caller
	 * returns at once; its entry is already queued and will be picked up.
	 */
	kick(): void {
		if (this.current === 'draining') return;
		this.current = 'draining';
		void this.drain();
	}

	private async drain(): Promise<void> {
		try {
			for (let entry = this.queue.shift(); entry; entry = this.queue.shift()) {
				let delivered = false;
				try {
					delivered = await this.deliver(entry.message);
				} catch (err) {
					// Only an injected sleep that rejects lands here
					this.fault(err, entry.message);
				} finally {
					this.active = null;
					entry.resolve(delivered);
				}
			}
		} finally {
			this.current = 'idle';
			this.observe(() => this.hooks.onIdle?.());
			// A producer may have enqueued after the last shift but before the
			// flag cleared; it saw "draining" and did not restart us.
			if (!this.queue.isEmpty) this.kick();
		}
	}

	private async deliver(message: OutboundMessage): Promise<boolean> {
		this.active = message;
		for (let attempt = 1; ; attempt++) {
			this.observe(() => this.hooks.onAttempt?.(message, attempt), message);
			const startTime = Date.now();
			const outcome = await this.send(message.text);
			const durationMs = Date.now() - startTime;

			switch (outcome.status) {
				case 'delivered':
					this.observe(() => this.hooks.onDelivered?.(message, attempt, durationMs), message);
					return true;
				case 'failed':
					this.observe(
						() => this.hooks.onFailed?.(message, attempt, outcome, durationMs),
						message,
					);
					return false;
				case 'rate_limited':
					this.observe(
						() => this.hooks.onRateLimited?.(message, attempt, outcome, durationMs),
						message,
					);
					await this.sleep(Math.max(0, outcome.retryAfterMs));
					break;
			}
		}
	}

	private observe(hook: () => void, message?: OutboundMessage): void {
		try {
			hook();
		} catch (err) {
			this.fault(err, message);
		}
	}

	private fault(err: unknown, message?: OutboundMessage): void {
		try {
			this.hooks.onFault?.(err, message);
		} catch (faultErr) {
			// Nothing left to report to inside the loop
			process.emitWarning(
				`Dispatcher fault handler threw: ${faultErr instanceof Error ? faultErr.message : String(faultErr)}`,
			);
		}
	}

	private async send(text: string): Promise<SendOutcome> {
		try {
			return await this.transport.send(text);
		} catch (err) {
			return {
				status: 'failed',
				error: err instanceof Error ? err : new Error(String(err)),
			};
		}
	}
}
