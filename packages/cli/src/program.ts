/**
 * Command tree of the relaylog CLI.
 */

import { Command } from 'commander';
import { registerCheckCommand } from './commands/check.js';
import { registerDemoCommand } from './commands/demo.js';
import { registerPipeCommand } from './commands/pipe.js';
import { registerSendCommand } from './commands/send.js';
import { registerVersionCommand } from './commands/version.js';
import * as output from './output.js';
import type { GlobalOptions } from './runtime.js';

export function createProgram(): Command {
	const program = new Command();

	program
		.name('relaylog')
		.description('Ordered, rate-limit-aware notifications to a Discord channel')
		.option('-c, --config <path>', 'Path to relaylog.yaml')
		.option('--json', 'Machine-readable output')
		.option('-q, --quiet', 'Only print errors')
		.option('--verbose', 'Show debug diagnostics')
		.hook('preAction', (thisCommand) => {
			const opts = thisCommand.opts<GlobalOptions>();
			output.setJsonMode(Boolean(opts.json));
			output.setQuietMode(Boolean(opts.quiet));
			output.setVerboseMode(Boolean(opts.verbose));
		});

	registerSendCommand(program);
	registerPipeCommand(program);
	registerDemoCommand(program);
	registerCheckCommand(program);
	registerVersionCommand(program);

	return program;
}
