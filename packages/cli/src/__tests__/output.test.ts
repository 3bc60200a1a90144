import chalk from 'chalk';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import * as output from '../output.js';

function captureLog() {
	const lines: string[] = [];
	vi.spyOn(console, 'log').mockImplementation((line?: unknown) => {
		lines.push(line === undefined ? '' : String(line));
	});
	return lines;
}

beforeEach(() => {
	chalk.level = 0;
});

afterEach(() => {
	output.setJsonMode(false);
	output.setQuietMode(false);
	output.setVerboseMode(false);
	vi.restoreAllMocks();
});

describe('deliverySummary', () => {
	it('prints the delivered count', () => {
		const lines = captureLog();

		output.deliverySummary({ sent: 5, delivered: 5 });

		expect(lines).toEqual(['', '  ✓ 5/5 delivered']);
	});

	it('names the failures', () => {
		const lines = captureLog();

		output.deliverySummary({ sent: 3, delivered: 1 });

		expect(lines).toEqual(['', '  ✗ 1/3 delivered, 2 failed']);
	});

	it('prints JSON with the failure count in json mode', () => {
		const lines = captureLog();
		output.setJsonMode(true);

		output.deliverySummary({ sent: 3, delivered: 2 });

		expect(lines.map((line) => JSON.parse(line))).toEqual([{ sent: 3, delivered: 2, failed: 1 }]);
	});

	it('prints nothing in quiet mode', () => {
		const lines = captureLog();
		output.setQuietMode(true);

		output.deliverySummary({ sent: 1, delivered: 0 });

		expect(lines).toEqual([]);
	});
});

describe('envVarTable', () => {
	const vars = [
		{ name: 'BOT_TOKEN', description: 'Token', help_url: 'https://example.test/token' },
		{ name: 'CHANNEL', description: 'Channel' },
		{ name: 'MENTION', description: 'Mention', required: false },
	];

	it('marks each variable as set, missing or optional', () => {
		const lines = captureLog();

		output.envVarTable(vars, { BOT_TOKEN: 'test-token' });

		expect(lines).toEqual([
			'Environment variables',
			'  NAME       STATE     DESCRIPTION',
			'  BOT_TOKEN  set       Token',
			'  CHANNEL    missing   Channel',
			'  MENTION    optional  Mention',
			'',
		]);
	});

	it('adds help links in verbose mode', () => {
		const lines = captureLog();
		output.setVerboseMode(true);

		output.envVarTable(vars, {});

		expect(lines).toContain('  … BOT_TOKEN: https://example.test/token');
	});
});
