/**
 * relaylog demo — Send one message of each severity.
 */

import type { Notifier } from '@relaylog/core';
import type { Severity } from '@relaylog/sdk';
import type { Command } from 'commander';
import { loadCliConfig } from '../config.js';
import * as output from '../output.js';
import { type GlobalOptions, createRuntime, runtimeOptionsFor } from '../runtime.js';

export const DEMO_MESSAGES: ReadonlyArray<readonly [Severity, string]> = [
	['info', 'relaylog demo: info message'],
	['success', 'relaylog demo: nightly import finished'],
	['warning', 'relaylog demo: upstream API close to its rate limit'],
	['error', 'relaylog demo: could not reach the database'],
	['log', 'relaylog demo: plain log line'],
];

export async function runDemo(notifier: Notifier, origin: string): Promise<boolean[]> {
	return Promise.all(DEMO_MESSAGES.map(([severity, text]) => notifier.enqueue(severity, text, origin)));
}

export function registerDemoCommand(program: Command): void {
	program
		.command('demo')
		.description('Send one message of each severity')
		.action(async (_opts: Record<string, never>, cmd: Command) => {
			const globals = cmd.optsWithGlobals<GlobalOptions>();
			try {
				const config = await loadCliConfig({ configPath: globals.config });
				const runtime = await createRuntime(config, runtimeOptionsFor(globals));

				const results = await runDemo(runtime.notifier, 'demo');
				await runtime.stop();

				const delivered = results.filter(Boolean).length;
				output.deliverySummary({ sent: results.length, delivered });
				if (delivered < results.length) process.exitCode = 1;
			} catch (err) {
				output.error(err instanceof Error ? err.message : String(err));
				process.exitCode = 1;
			}
		});
}
