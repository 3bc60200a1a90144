import type { LogEntry, Logger } from '@relaylog/sdk';
import { MockLogger } from '@relaylog/sdk';
import { describe, expect, it, vi } from 'vitest';
import { LoggerManager } from '../logger.js';
import { isInterceptionSuspended } from '../stderr-interceptor.js';

const entry: LogEntry = {
	timestamp: '2026-03-04T09:05:07.042Z',
	phase: 'deliver.success',
	message_id: 'msg_0123456789abcdef',
};

class ThrowingLogger implements Logger {
	readonly id = 'throwing';
	async init(): Promise<void> {}
	async log(): Promise<void> {
		throw new Error('write failed');
	}
	async flush(): Promise<void> {
		throw new Error('flush failed');
	}
	async shutdown(): Promise<void> {}
}

describe('LoggerManager', () => {
	it('fans entries out to every logger', async () => {
		const manager = new LoggerManager();
		const first = new MockLogger('first');
		const second = new MockLogger('second');
		manager.addLogger(first);
		manager.addLogger(second);

		await manager.log(entry);

		expect(first.entries).toEqual([entry]);
		expect(second.entries).toEqual([entry]);
		expect(manager.size).toBe(2);
	});

	it('keeps going when one logger throws and reports it', async () => {
		const onError = vi.fn();
		const manager = new LoggerManager(onError);
		const healthy = new MockLogger();
		manager.addLogger(new ThrowingLogger());
		manager.addLogger(healthy);

		await manager.log(entry);
		await manager.flush();

		expect(healthy.entries).toHaveLength(1);
		expect(healthy.flushed).toBe(true);
		expect(onError.mock.calls.map((call) => [call[0], call[1].message])).toEqual([
			['throwing', 'write failed'],
			['throwing', 'flush failed'],
		]);
	});

	it('calls loggers with stderr interception suspended', async () => {
		const manager = new LoggerManager();
		const seen: boolean[] = [];
		const watcher: Logger = {
			id: 'watcher',
			init: async () => {},
			log: async () => {
				seen.push(isInterceptionSuspended());
			},
			flush: async () => {},
			shutdown: async () => {},
		};
		manager.addLogger(watcher);

		await manager.log(entry);

		expect(seen).toEqual([true]);
		expect(isInterceptionSuspended()).toBe(false);
	});

	it('shuts every logger down', async () => {
		const manager = new LoggerManager();
		const logger = new MockLogger();
		manager.addLogger(logger);

		await manager.shutdown();

		expect(logger.shutdownCalled).toBe(true);
	});
});
