/**
 * Terminal output for the relaylog commands.
 *
 * Everything here respects --json and --quiet. Delivery diagnostics are not
 * printed here; they come from the console logger on stderr.
 */

import type { EnvVarDefinition } from '@relaylog/sdk';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';

// ─── Modes ───────────────────────────────────────────────────────────────────

let jsonMode = false;
let quietMode = false;
let verboseMode = false;

export function setJsonMode(enabled: boolean): void {
	jsonMode = enabled;
}

export function setQuietMode(enabled: boolean): void {
	quietMode = enabled;
}

export function setVerboseMode(enabled: boolean): void {
	verboseMode = enabled;
}

export function isJsonMode(): boolean {
	return jsonMode;
}

function silenced(): boolean {
	return quietMode || jsonMode;
}

// ─── Lines ───────────────────────────────────────────────────────────────────

export function info(message: string): void {
	if (silenced()) return;
	console.log(message);
}

export function success(message: string): void {
	if (silenced()) return;
	console.log(chalk.green(`  ✓ ${message}`));
}

/** Shown in quiet mode too; only --json suppresses it */
export function error(message: string): void {
	if (jsonMode) return;
	console.error(chalk.red(`  ✗ ${message}`));
}

export function warn(message: string): void {
	if (silenced()) return;
	console.warn(chalk.yellow(`  ! ${message}`));
}

export function verbose(message: string): void {
	if (!verboseMode || silenced()) return;
	console.log(chalk.dim(`  … ${message}`));
}

export function json(data: unknown): void {
	console.log(JSON.stringify(data, null, 2));
}

// ─── Delivery results ────────────────────────────────────────────────────────

export interface DeliverySummary {
	sent: number;
	delivered: number;
}

/**
 * Final line of demo and pipe: how many messages the channel accepted.
 */
export function deliverySummary(summary: DeliverySummary): void {
	const failed = summary.sent - summary.delivered;
	if (jsonMode) {
		json({ ...summary, failed });
		return;
	}
	if (quietMode) return;

	console.log();
	const counts = `${summary.delivered}/${summary.sent} delivered`;
	if (failed === 0) {
		console.log(chalk.green(`  ✓ ${counts}`));
	} else {
		console.log(chalk.red(`  ✗ ${counts}, ${failed} failed`));
	}
}

/** Spinner shown while a message waits in the queue; silent under --json and --quiet */
export function sending(text: string): Ora {
	if (silenced()) return ora({ text, isSilent: true });
	return ora({ text, color: 'cyan' }).start();
}

// ─── Environment variables ───────────────────────────────────────────────────

/**
 * Table of the variables the transport reads, marked as set or missing in env.
 */
export function envVarTable(vars: EnvVarDefinition[], env: NodeJS.ProcessEnv = process.env): void {
	if (silenced()) return;

	const rows = vars.map((v) => ({
		name: v.name,
		state: env[v.name] ? 'set' : v.required === false ? 'optional' : 'missing',
		description: v.description,
	}));
	const nameWidth = Math.max(4, ...rows.map((row) => row.name.length)) + 2;
	const stateWidth = 10;

	console.log(chalk.bold('Environment variables'));
	console.log(chalk.dim(`  ${'NAME'.padEnd(nameWidth)}${'STATE'.padEnd(stateWidth)}DESCRIPTION`));
	for (const row of rows) {
		const state = row.state.padEnd(stateWidth);
		const colored =
			row.state === 'set' ? chalk.green(state) : row.state === 'missing' ? chalk.red(state) : chalk.dim(state);
		console.log(`  ${row.name.padEnd(nameWidth)}${colored}${row.description}`);
	}
	for (const v of vars) {
		if (v.help_url) verbose(`${v.name}: ${v.help_url}`);
	}
	console.log();
}
