/**
 * Runtime wiring shared by the commands: transport, console logger,
 * notifier and shutdown hooks built from the resolved config.
 */

import {
	Notifier,
	installShutdownHooks,
	interceptStderr,
	suspendInterception,
} from '@relaylog/core';
import { ConsoleLogger } from '@relaylog/logger-console';
import type { LogLevel, Transport } from '@relaylog/sdk';
import registerDiscord from '@relaylog/transport-discord';
import { type CliConfig, validateAgainstSchema } from './config.js';
import * as output from './output.js';

/** Options every command inherits from the program */
export type GlobalOptions = {
	config?: string;
	json?: boolean;
	quiet?: boolean;
	verbose?: boolean;
};

export interface RuntimeOptions {
	/** Use this transport instead of building one from config */
	transport?: Transport;
	/** Mirror formatted lines to the console (default: true) */
	echo?: boolean;
	/** Overrides the configured console logger level */
	loggerLevel?: LogLevel;
	/** Install SIGINT/SIGTERM/exit hooks (default: true) */
	installHooks?: boolean;
	/** Forward this process's own stderr lines as error messages */
	captureStderr?: boolean;
}

export interface Runtime {
	notifier: Notifier;
	/** Restore stderr, remove the hooks, flush, and release transport and logger */
	stop(): Promise<void>;
}

/** Map global CLI flags onto runtime options */
export function runtimeOptionsFor(globals: GlobalOptions): RuntimeOptions {
	let loggerLevel: LogLevel | undefined;
	if (globals.verbose) loggerLevel = 'debug';
	else if (globals.quiet || globals.json) loggerLevel = 'error';
	return {
		echo: !globals.quiet && !globals.json,
		loggerLevel,
	};
}

export async function createRuntime(
	config: CliConfig,
	options: RuntimeOptions = {},
): Promise<Runtime> {
	let transport = options.transport;
	if (!transport) {
		const registration = registerDiscord();
		if (registration.configSchema) {
			validateAgainstSchema(registration.configSchema, config.transport, registration.id);
		}
		transport = registration.create(config.transport);
	}

	const logger = new ConsoleLogger();
	await logger.init({
		level: options.loggerLevel ?? config.logger.level,
		color: config.logger.color,
	});

	const notifier = new Notifier({
		transport,
		escalationTarget: config.escalation_target,
		loggers: [logger],
		echo: options.echo ?? true,
		flushPollIntervalMs: config.flush.poll_interval_ms,
		forcedFlushTimeoutMs: config.flush.forced_timeout_ms,
	});
	notifier.on('error', (err: Error) => {
		suspendInterception(() => output.warn(err.message));
	});

	const restoreStderr = options.captureStderr ? interceptStderr(notifier) : () => {};
	const uninstall =
		options.installHooks === false
			? () => {}
			: installShutdownHooks(notifier, {
					forcedFlushTimeoutMs: config.flush.forced_timeout_ms,
				});

	return {
		notifier,
		async stop() {
			restoreStderr();
			uninstall();
			await notifier.shutdown();
		},
	};
}
