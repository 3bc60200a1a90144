/**
 * relaylog pipe — Forward every non-blank stdin line as a message, in order.
 *
 *   ./nightly-job.sh 2>&1 | relaylog pipe --severity warning --origin nightly
 */

import { createInterface } from 'node:readline';
import type { Notifier } from '@relaylog/core';
import { RelayLogError } from '@relaylog/core';
import type { Severity } from '@relaylog/sdk';
import { SEVERITIES, isSeverity } from '@relaylog/sdk';
import type { Command } from 'commander';
import { loadCliConfig } from '../config.js';
import * as output from '../output.js';
import { type GlobalOptions, createRuntime, runtimeOptionsFor } from '../runtime.js';

export interface PipeSummary {
	lines: number;
	delivered: number;
	failed: number;
}

type PipeOptions = {
	severity: string;
	origin: string;
	captureStderr?: boolean;
};

/**
 * Enqueue each line as it arrives, then wait for every outcome.
 */
export async function forwardLines(
	lines: AsyncIterable<string>,
	notifier: Notifier,
	severity: Severity,
	origin: string,
): Promise<PipeSummary> {
	const handles: Promise<boolean>[] = [];
	for await (const line of lines) {
		if (!line.trim()) continue;
		handles.push(notifier.enqueue(severity, line.trimEnd(), origin));
	}
	const results = await Promise.all(handles);
	const delivered = results.filter(Boolean).length;
	return { lines: results.length, delivered, failed: results.length - delivered };
}

export function registerPipeCommand(program: Command): void {
	program
		.command('pipe')
		.description('Forward stdin lines as messages')
		.option('-s, --severity <severity>', 'Severity of every line', 'info')
		.option('-o, --origin <name>', 'Origin shown in the messages', 'stdin')
		.option('--capture-stderr', "Also forward relaylog's own stderr output as errors")
		.action(async (_opts: PipeOptions, cmd: Command) => {
			const globals = cmd.optsWithGlobals<GlobalOptions & PipeOptions>();
			try {
				const severity = globals.severity.toLowerCase();
				if (!isSeverity(severity)) {
					throw new RelayLogError(
						`Unknown severity '${globals.severity}'. Use: ${SEVERITIES.join(', ')}`,
					);
				}

				const config = await loadCliConfig({ configPath: globals.config });
				const runtime = await createRuntime(config, {
					...runtimeOptionsFor(globals),
					captureStderr: globals.captureStderr,
				});
				const input = createInterface({ input: process.stdin, crlfDelay: Number.POSITIVE_INFINITY });

				const summary = await forwardLines(input, runtime.notifier, severity, globals.origin);
				await runtime.stop();

				output.deliverySummary({ sent: summary.lines, delivered: summary.delivered });
				if (summary.failed > 0) process.exitCode = 1;
			} catch (err) {
				output.error(err instanceof Error ? err.message : String(err));
				process.exitCode = 1;
			}
		});
}
