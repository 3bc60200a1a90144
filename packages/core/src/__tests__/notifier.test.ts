import type { LogEntry, Logger } from '@relaylog/sdk';
import { MockLogger, MockTransport } from '@relaylog/sdk';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConfigurationError } from '../errors.js';
import { Notifier, type NotifierOptions } from '../notifier.js';

const NOW = new Date(2026, 2, 4, 9, 5, 7, 42);
const STAMP = '[2026-03-04 09:05:07.042]';

function createNotifier(overrides: Partial<NotifierOptions> = {}) {
	const transport = new MockTransport('discord');
	const logger = new MockLogger();
	const notifier = new Notifier({
		transport,
		loggers: [logger],
		echo: false,
		now: () => NOW,
		...overrides,
	});
	return { notifier, transport, logger };
}

class FailingLogger implements Logger {
	readonly id = 'failing';
	async init(): Promise<void> {}
	async log(_entry: LogEntry): Promise<void> {
		throw new Error('disk full');
	}
	async flush(): Promise<void> {}
	async shutdown(): Promise<void> {}
}

afterEach(() => {
	vi.restoreAllMocks();
});

describe('Notifier — formatting', () => {
	it('posts the formatted line for each severity', async () => {
		const { notifier, transport } = createNotifier();

		await Promise.all([
			notifier.log('plain', 'worker'),
			notifier.logInfo('fetched 42 members', 'clan-sync'),
			notifier.logSuccess('done', 'worker'),
			notifier.logWarning('slow response', 'worker'),
			notifier.logError('db down', 'updater'),
		]);

		expect(transport.sent).toEqual([
			`\u{1F4DD} ${STAMP} [worker] LOG: plain`,
			`\u{1F535} ${STAMP} [clan-sync] INFO: fetched 42 members`,
			`\u{1F7E2} ${STAMP} [worker] SUCCESS: done`,
			`\u{1F7E1} ${STAMP} [worker] WARNING: slow response`,
			`\u{1F534} ${STAMP} [updater] ERROR: db down`,
		]);
	});

	it('mentions the escalation target on errors only', async () => {
		const { notifier, transport } = createNotifier({ escalationTarget: '1234' });

		await notifier.logError('db down', 'updater');
		await notifier.logWarning('slow', 'updater');

		expect(transport.sent).toEqual([
			`<@1234> \u{1F534} ${STAMP} [updater] ERROR: db down`,
			`\u{1F7E1} ${STAMP} [updater] WARNING: slow`,
		]);
	});

	it('treats an empty escalation target as none', async () => {
		const { notifier, transport } = createNotifier({ escalationTarget: '' });

		await notifier.logError('db down', 'updater');

		expect(transport.sent).toEqual([`\u{1F534} ${STAMP} [updater] ERROR: db down`]);
	});

	it('echoes each line to the matching console method', async () => {
		const log = vi.spyOn(console, 'log').mockImplementation(() => {});
		const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
		const error = vi.spyOn(console, 'error').mockImplementation(() => {});
		const { notifier } = createNotifier({ echo: true });

		await notifier.logInfo('a', 'o');
		await notifier.logWarning('b', 'o');
		await notifier.logError('c', 'o');

		expect(log).toHaveBeenCalledWith(`\u{1F535} ${STAMP} [o] INFO: a`);
		expect(warn).toHaveBeenCalledWith(`\u{1F7E1} ${STAMP} [o] WARNING: b`);
		expect(error).toHaveBeenCalledWith(`\u{1F534} ${STAMP} [o] ERROR: c`);
	});
});

describe('Notifier — delivery', () => {
	it('keeps global submission order across concurrent producers', async () => {
		const { notifier, transport } = createNotifier();
		transport.setLatency(1);
		const submitted: string[] = [];

		const producers = [0, 1, 2, 3, 4].map(async (p) => {
			const handles: Promise<boolean>[] = [];
			for (let i = 0; i < 10; i++) {
				await new Promise((resolve) => setTimeout(resolve, (p * 7 + i * 3) % 4));
				const text = `p${p}-${i}`;
				submitted.push(text);
				handles.push(notifier.log(text, `producer-${p}`));
			}
			return Promise.all(handles);
		});
		const results = await Promise.all(producers);

		expect(results.flat().every(Boolean)).toBe(true);
		expect(transport.sent.map((line) => line.slice(line.indexOf('LOG: ') + 5))).toEqual(
			submitted,
		);
		expect(transport.maxInFlight).toBe(1);
	});

	it('waits the requested delay before retrying a rate-limited message', async () => {
		const { notifier, transport } = createNotifier();
		transport.queueOutcomes({ status: 'rate_limited', retryAfterMs: 50 });

		const startTime = Date.now();
		const delivered = await notifier.logInfo('X', 'o');

		expect(delivered).toBe(true);
		expect(Date.now() - startTime).toBeGreaterThanOrEqual(45);
		expect(transport.sent).toHaveLength(2);
	});

	it('resolves false on failure and delivers the next message without delay', async () => {
		const sleep = vi.fn(async () => {});
		const { notifier, transport } = createNotifier({ sleep });
		transport.queueOutcomes({
			status: 'failed',
			error: new Error('server error'),
			httpStatus: 500,
		});

		const results = await Promise.all([notifier.logInfo('Y', 'o'), notifier.logInfo('Z', 'o')]);

		expect(results).toEqual([false, true]);
		expect(sleep).not.toHaveBeenCalled();
	});

	it('counts outcomes in status()', async () => {
		const { notifier, transport } = createNotifier({ sleep: async () => {} });
		transport.queueOutcomes(
			{ status: 'rate_limited', retryAfterMs: 250 },
			{ status: 'failed', error: new Error('server error'), httpStatus: 500 },
		);

		await Promise.all([notifier.logInfo('A', 'o'), notifier.logInfo('B', 'o')]);

		expect(notifier.status()).toEqual({
			state: 'idle',
			pending: 0,
			in_flight: null,
			delivered: 1,
			failed: 1,
			rate_limited: 1,
		});
	});

	it('reports pending and in-flight messages while draining', () => {
		const { notifier } = createNotifier();

		void notifier.logInfo('first', 'o');
		void notifier.logInfo('second', 'o');
		void notifier.logInfo('third', 'o');

		const status = notifier.status();
		expect(status.state).toBe('draining');
		expect(status.pending).toBe(2);
		expect(status.in_flight).toMatch(/^msg_[0-9a-f]{16}$/);
	});

	it('emits delivery and rate_limited events', async () => {
		const { notifier, transport } = createNotifier({ sleep: async () => {} });
		transport.queueOutcomes(
			{ status: 'rate_limited', retryAfterMs: 300 },
			{ status: 'delivered' },
			{ status: 'failed', error: new Error('bad request'), httpStatus: 400 },
		);
		const deliveries: Array<{ delivered: boolean; attempts: number }> = [];
		const rateLimits: number[] = [];
		notifier.on('delivery', (event: { delivered: boolean; attempts: number }) => {
			deliveries.push({ delivered: event.delivered, attempts: event.attempts });
		});
		notifier.on('rate_limited', (event: { retryAfterMs: number }) => {
			rateLimits.push(event.retryAfterMs);
		});

		await Promise.all([notifier.logInfo('A', 'o'), notifier.logInfo('B', 'o')]);

		expect(deliveries).toEqual([
			{ delivered: true, attempts: 2 },
			{ delivered: false, attempts: 1 },
		]);
		expect(rateLimits).toEqual([300]);
	});
	it('keeps a delivered result when a delivery listener throws', async () => {
		const { notifier, transport } = createNotifier();
		const errors: Error[] = [];
		notifier.on('error', (err: Error) => errors.push(err));
		notifier.on('delivery', () => {
			throw new Error('listener broke');
		});

		expect(await notifier.logInfo('A', 'o')).toBe(true);

		expect(transport.sent).toHaveLength(1);
		expect(notifier.status()).toMatchObject({ delivered: 1, failed: 0 });
		expect(errors.map((err) => err.message)).toEqual(['listener broke']);
	});

	it('still retries when a rate_limited listener throws', async () => {
		const { notifier, transport } = createNotifier({ sleep: async () => {} });
		transport.queueOutcomes({ status: 'rate_limited', retryAfterMs: 100 });
		notifier.on('error', () => {});
		notifier.on('rate_limited', () => {
			throw new Error('listener broke');
		});

		expect(await notifier.logInfo('X', 'o')).toBe(true);

		expect(transport.sent).toHaveLength(2);
		expect(notifier.status()).toMatchObject({ delivered: 1, failed: 0, rate_limited: 1 });
	});

	it('turns a throwing error listener into a process warning', async () => {
		const warn = vi.spyOn(process, 'emitWarning').mockImplementation(() => {});
		const { notifier } = createNotifier();
		notifier.on('delivery', () => {
			throw new Error('listener broke');
		});
		notifier.on('error', () => {
			throw new Error('error listener broke');
		});

		expect(await notifier.logInfo('A', 'o')).toBe(true);
		await notifier.flush();

		expect(warn).toHaveBeenCalledWith('Dispatcher fault handler threw: error listener broke');
		expect(notifier.isDrained).toBe(true);
	});
});

describe('Notifier — diagnostics', () => {
	it('logs each phase of a delivered message in order', async () => {
		const { notifier, logger } = createNotifier();

		await notifier.logInfo('hello', 'o');

		expect(logger.entries.map((entry) => entry.phase)).toEqual([
			'system.start',
			'message.enqueue',
			'deliver.attempt',
			'deliver.success',
			'dispatch.idle',
		]);
		const success = logger.entriesForPhase('deliver.success')[0];
		expect(success?.transport).toBe('discord');
		expect(success?.origin).toBe('o');
		expect(success?.severity).toBe('info');
		expect(success?.attempt).toBe(1);
		expect(success?.result).toBe('delivered');
	});

	it('records retry delay and failure status', async () => {
		const { notifier, transport, logger } = createNotifier({ sleep: async () => {} });
		transport.queueOutcomes(
			{ status: 'rate_limited', retryAfterMs: 250 },
			{ status: 'failed', error: new Error('server error'), httpStatus: 500 },
		);

		await notifier.logInfo('A', 'o');

		const retry = logger.entriesForPhase('deliver.retry')[0];
		expect(retry?.delay_ms).toBe(250);
		expect(retry?.http_status).toBe(429);
		expect(retry?.attempt).toBe(1);

		const failure = logger.entriesForPhase('deliver.failure')[0];
		expect(failure?.attempt).toBe(2);
		expect(failure?.http_status).toBe(500);
		expect(failure?.error).toBe('server error');
	});

	it('ties every entry of a message to its ID', async () => {
		const { notifier, logger } = createNotifier();

		await notifier.logInfo('hello', 'o');

		const enqueue = logger.entriesForPhase('message.enqueue')[0];
		const id = enqueue?.message_id ?? '';
		expect(logger.entriesForMessage(id).map((entry) => entry.phase)).toEqual([
			'message.enqueue',
			'deliver.attempt',
			'deliver.success',
		]);
	});

	it('turns a logger failure into an error event without affecting delivery', async () => {
		const transport = new MockTransport();
		const notifier = new Notifier({ transport, loggers: [new FailingLogger()], echo: false });
		const errors: Error[] = [];
		notifier.on('error', (err: Error) => errors.push(err));

		expect(await notifier.logInfo('still sent', 'o')).toBe(true);

		await vi.waitFor(() => expect(errors.length).toBeGreaterThan(0));
		expect(errors[0]?.message).toBe('Logger "failing" failed: disk full');
		expect(transport.sent).toHaveLength(1);
	});
});

describe('Notifier — flush', () => {
	it('flush() waits for every queued message', async () => {
		const { notifier, transport } = createNotifier({ flushPollIntervalMs: 5 });
		transport.setLatency(10);
		const settled: boolean[] = [];

		for (const text of ['a', 'b', 'c']) {
			void notifier.logInfo(text, 'o').then((delivered) => settled.push(delivered));
		}
		await notifier.flush();

		expect(notifier.isDrained).toBe(true);
		expect(transport.sent).toHaveLength(3);
		expect(settled).toEqual([true, true, true]);
	});

	it('flush() returns at once when nothing is queued', async () => {
		const { notifier, logger } = createNotifier();

		await notifier.flush();

		expect(logger.entriesForPhase('flush.start')).toHaveLength(0);
	});

	it('forcedFlush() returns true when already drained', async () => {
		const { notifier } = createNotifier();
		await notifier.logInfo('done', 'o');

		expect(notifier.forcedFlush(50)).toBe(true);
	});

	it('forcedFlush() gives up at the ceiling while a message is stuck', () => {
		const { notifier, transport, logger } = createNotifier({
			sleep: () => new Promise<void>(() => {}),
		});
		transport.respondWith(() => ({ status: 'rate_limited', retryAfterMs: 60_000 }));
		let settled = false;
		void notifier.logInfo('stuck', 'o').then(() => {
			settled = true;
		});

		const startTime = Date.now();
		const drained = notifier.forcedFlush(50);
		const elapsed = Date.now() - startTime;

		expect(drained).toBe(false);
		expect(elapsed).toBeGreaterThanOrEqual(50);
		expect(elapsed).toBeLessThan(1_000);
		expect(settled).toBe(false);
		expect(logger.entriesForPhase('flush.timeout')).toHaveLength(1);
	});

	it('shutdown() flushes and releases transport and loggers', async () => {
		const { notifier, transport, logger } = createNotifier();
		void notifier.logInfo('last words', 'o');

		await notifier.shutdown();

		expect(transport.sent).toHaveLength(1);
		expect(transport.shutdownCalled).toBe(true);
		expect(logger.shutdownCalled).toBe(true);
		expect(logger.entriesForPhase('system.stop')).toHaveLength(1);
	});
});

describe('Notifier — configuration', () => {
	it('rejects a non-positive poll interval', () => {
		expect(() => createNotifier({ flushPollIntervalMs: 0 })).toThrow(ConfigurationError);
	});

	it('rejects a non-positive forced flush ceiling', () => {
		expect(() => createNotifier({ forcedFlushTimeoutMs: -1 })).toThrow(
			'forcedFlushTimeoutMs must be a positive number, got -1',
		);
	});

	it('rejects a forced flush ceiling that is not a number', () => {
		const { notifier } = createNotifier();
		void notifier.logInfo('pending', 'o');

		expect(() => notifier.forcedFlush(Number.NaN)).toThrow(
			'ceilingMs must be a positive number, got NaN',
		);
	});
});
