/**
 * relaylog version — Print version info.
 *
 * Shows relaylog version, node version, platform.
 */

import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Command } from 'commander';
import * as output from '../output.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

export async function getVersion(): Promise<string> {
	try {
		// Walk up from commands/ to the cli package.json
		const pkgPath = resolve(__dirname, '..', '..', 'package.json');
		const pkg: unknown = JSON.parse(await readFile(pkgPath, 'utf-8'));
		if (pkg !== null && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
			return pkg.version;
		}
		return 'unknown';
	} catch {
		return 'unknown';
	}
}

export function registerVersionCommand(program: Command): void {
	program
		.command('version')
		.description('Print version info')
		.action(async () => {
			const version = await getVersion();

			if (output.isJsonMode()) {
				output.json({
					relaylog: version,
					node: process.version,
					platform: `${process.platform} ${process.arch}`,
				});
				return;
			}

			output.info(`relaylog ${version}`);
			output.info(`node     ${process.version}`);
			output.info(`platform ${process.platform} ${process.arch}`);
		});
}
