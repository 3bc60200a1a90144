/**
 * relaylog check — Validate configuration without sending anything.
 *
 * Lists the environment variables the transport reads, then resolves the
 * config and prints the effective settings.
 */

import { ConfigurationError } from '@relaylog/core';
import registerDiscord from '@relaylog/transport-discord';
import type { Command } from 'commander';
import { type CliConfig, loadCliConfig, validateAgainstSchema } from '../config.js';
import { listEnvVars } from '../env-metadata.js';
import * as output from '../output.js';
import type { GlobalOptions } from '../runtime.js';

/** Config as printed: the token never appears in full */
export function describeConfig(config: CliConfig): Record<string, unknown> {
	const token = config.transport.token;
	return {
		transport: {
			token: token.length > 8 ? `${token.slice(0, 4)}…${token.slice(-4)}` : '****',
			channel_id: config.transport.channel_id,
			api_base: config.transport.api_base ?? 'default',
			request_timeout_ms: config.transport.request_timeout ?? 'default',
		},
		escalation_target: config.escalation_target ?? null,
		flush: config.flush,
		logger: config.logger,
		files: config.files,
	};
}

export function registerCheckCommand(program: Command): void {
	program
		.command('check')
		.description('Validate configuration and list the environment variables')
		.action(async (_opts: Record<string, never>, cmd: Command) => {
			const globals = cmd.optsWithGlobals<GlobalOptions>();

			output.envVarTable(listEnvVars());

			try {
				const config = await loadCliConfig({ configPath: globals.config });
				const registration = registerDiscord();
				if (registration.configSchema) {
					validateAgainstSchema(registration.configSchema, config.transport, registration.id);
				}

				if (output.isJsonMode()) {
					output.json({ valid: true, config: describeConfig(config) });
					return;
				}
				output.success('Configuration is valid');
				const described = describeConfig(config);
				output.info(JSON.stringify(described, null, 2));
			} catch (err) {
				const field = err instanceof ConfigurationError ? err.field : undefined;
				const message = err instanceof Error ? err.message : String(err);
				if (output.isJsonMode()) {
					output.json({ valid: false, field, error: message });
				} else {
					output.error(message);
				}
				process.exitCode = 1;
			}
		});
}
