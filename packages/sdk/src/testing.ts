/**
 * Test harness for relaylog transport and logger authors.
 *
 * Provides mock implementations and helpers for testing the delivery
 * pipeline without a network.
 */

import { generateMessageId } from './format.js';
import type { Logger } from './logger.js';
import type { Transport } from './transport.js';
import type { LogEntry, OutboundMessage, SendOutcome } from './types.js';

// ─── Mock Transport ───────────────────────────────────────────────────────────

export type MockSendHandler = (
	text: string,
	callIndex: number,
) => SendOutcome | Promise<SendOutcome>;

/**
 * Mock transport for testing.
 * Records every send, plays back scripted outcomes, and tracks how many
 * sends were in flight at once.
 */
export class MockTransport implements Transport {
	readonly id: string;
	/** Texts in the order send() was called (retries appear again) */
	readonly sent: string[] = [];
	private readonly script: SendOutcome[] = [];
	private handler?: MockSendHandler;
	private latencyMs = 0;
	private active = 0;
	private peak = 0;
	shutdownCalled = false;

	constructor(id = 'mock-transport') {
		this.id = id;
	}

	/** Outcomes returned by the next calls, in order; afterwards sends are delivered */
	queueOutcomes(...outcomes: SendOutcome[]): void {
		this.script.push(...outcomes);
	}

	/** Decide each outcome with a function (takes precedence over the script) */
	respondWith(handler: MockSendHandler): void {
		this.handler = handler;
	}

	/** Simulated network latency per send */
	setLatency(ms: number): void {
		this.latencyMs = ms;
	}

	async send(text: string): Promise<SendOutcome> {
		const callIndex = this.sent.length;
		this.sent.push(text);
		this.active++;
		this.peak = Math.max(this.peak, this.active);
		try {
			if (this.latencyMs > 0) {
				await new Promise((resolve) => setTimeout(resolve, this.latencyMs));
			}
			if (this.handler) return await this.handler(text, callIndex);
			return this.script.shift() ?? { status: 'delivered' };
		} finally {
			this.active--;
		}
	}

	async shutdown(): Promise<void> {
		this.shutdownCalled = true;
	}

	/** Sends currently awaiting an outcome */
	get inFlight(): number {
		return this.active;
	}

	/** Highest number of overlapping sends observed */
	get maxInFlight(): number {
		return this.peak;
	}
}

// ─── Mock Logger ──────────────────────────────────────────────────────────────

/**
 * Mock logger for testing.
 * Records all log entries for assertion.
 */
export class MockLogger implements Logger {
	readonly id: string;
	readonly entries: LogEntry[] = [];
	initialized = false;
	flushed = false;
	shutdownCalled = false;

	constructor(id = 'mock-logger') {
		this.id = id;
	}

	async init(_config: Record<string, unknown>): Promise<void> {
		this.initialized = true;
	}

	async log(entry: LogEntry): Promise<void> {
		this.entries.push(entry);
	}

	async flush(): Promise<void> {
		this.flushed = true;
	}

	async shutdown(): Promise<void> {
		this.flushed = true;
		this.shutdownCalled = true;
	}

	/** Get entries for a specific phase */
	entriesForPhase(phase: LogEntry['phase']): LogEntry[] {
		return this.entries.filter((e) => e.phase === phase);
	}

	/** Get entries for a specific message */
	entriesForMessage(messageId: string): LogEntry[] {
		return this.entries.filter((e) => e.message_id === messageId);
	}
}

// ─── Test Message Factory ─────────────────────────────────────────────────────

/**
 * Create a test message with sensible defaults.
 */
export function createTestMessage(overrides?: Partial<OutboundMessage>): OutboundMessage {
	return Object.freeze({
		id: generateMessageId(),
		text: 'test message',
		severity: 'info',
		origin: 'test-origin',
		submittedAt: Date.now(),
		...overrides,
	});
}
