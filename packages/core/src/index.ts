/**
 * @relaylog/core — ordered, rate-limit-aware notification delivery.
 */

export type { DispatcherHooks, DispatcherOptions, DispatcherState, Sleep } from './dispatcher.js';
export { Dispatcher, defaultSleep } from './dispatcher.js';

export type { TransportErrorOptions } from './errors.js';
export { ConfigurationError, RelayLogError, TransportError } from './errors.js';

export type { DrainCheck } from './flush.js';
export {
	DEFAULT_FLUSH_POLL_INTERVAL_MS,
	DEFAULT_FORCED_FLUSH_TIMEOUT_MS,
	waitForDrain,
	waitForDrainSync,
} from './flush.js';

export type { LoggerErrorHandler } from './logger.js';
export { LoggerManager } from './logger.js';

export type { NotifierEvents, NotifierOptions, NotifierStatus } from './notifier.js';
export { Notifier } from './notifier.js';

export type { QueuedEntry } from './queue.js';
export { MessageQueue } from './queue.js';

export type { ShutdownHookOptions } from './shutdown.js';
export { installShutdownHooks } from './shutdown.js';

export type { ErrorSink, InterceptOptions } from './stderr-interceptor.js';
export { interceptStderr, isInterceptionSuspended, suspendInterception } from './stderr-interceptor.js';
