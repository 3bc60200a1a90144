/**
 * relaylog send — Deliver one message and report whether it arrived.
 *
 *   relaylog send error "database unreachable" --origin nightly-sync
 */

import type { Notifier, NotifierStatus } from '@relaylog/core';
import { RelayLogError } from '@relaylog/core';
import type { Severity } from '@relaylog/sdk';
import { SEVERITIES, isSeverity } from '@relaylog/sdk';
import type { Command } from 'commander';
import { loadCliConfig } from '../config.js';
import * as output from '../output.js';
import { type GlobalOptions, createRuntime, runtimeOptionsFor } from '../runtime.js';

export interface SendRequest {
	severity: Severity;
	text: string;
}

type SendOptions = {
	origin: string;
};

export function parseSendArgs(type: string, words: string[]): SendRequest {
	const severity = type.toLowerCase();
	if (!isSeverity(severity)) {
		throw new RelayLogError(`Unknown severity '${type}'. Use: ${SEVERITIES.join(', ')}`);
	}
	const text = words.join(' ').trim();
	if (!text) {
		throw new RelayLogError('Message is required');
	}
	return { severity, text };
}

/** JSON printed by `send --json`: this message's outcome next to the notifier totals */
export function sendReport(
	delivered: boolean,
	notifier: Notifier,
): { delivered: boolean; status: NotifierStatus } {
	return { delivered, status: notifier.status() };
}

export function registerSendCommand(program: Command): void {
	program
		.command('send <severity> <message...>')
		.description(`Send one message (severity: ${SEVERITIES.join(', ')})`)
		.option('-o, --origin <name>', 'Origin shown in the message', 'relaylog')
		.action(async (type: string, words: string[], _opts: SendOptions, cmd: Command) => {
			const globals = cmd.optsWithGlobals<GlobalOptions & SendOptions>();
			try {
				const request = parseSendArgs(type, words);
				const config = await loadCliConfig({ configPath: globals.config });
				const runtime = await createRuntime(config, {
					...runtimeOptionsFor(globals),
					echo: false,
				});

				const spin = output.sending(`Sending ${request.severity} message...`);
				const delivered = await runtime.notifier.enqueue(
					request.severity,
					request.text,
					globals.origin,
				);
				await runtime.stop();

				if (output.isJsonMode()) {
					output.json(sendReport(delivered, runtime.notifier));
				} else if (delivered) {
					spin.succeed('Delivered');
				} else {
					spin.fail('Not delivered (see diagnostics above)');
				}
				if (!delivered) process.exitCode = 1;
			} catch (err) {
				output.error(err instanceof Error ? err.message : String(err));
				process.exitCode = 1;
			}
		});
}
