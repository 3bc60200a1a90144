/**
 * Console logger — human-readable colored diagnostics.
 *
 * Writes to process.stderr so stdout stays clean for JSON output.
 */

import type { LogEntry, LogLevel, Logger } from '@relaylog/sdk';
import { formatCompact, formatVerbose, shouldLog } from './format.js';

export interface ConsoleLoggerConfig {
	level?: LogLevel;
	color?: boolean;
	compact?: boolean;
	show_metadata?: boolean;
}

const LEVELS: readonly string[] = ['debug', 'info', 'warn', 'error'];

export class ConsoleLogger implements Logger {
	readonly id = 'console';
	private level = 'info';
	private useColor = process.stderr.isTTY ?? false;
	private compact = true;
	private showMetadata = false;

	async init(config: Record<string, unknown>): Promise<void> {
		const { level, color, compact, show_metadata } = config;
		if (typeof level === 'string' && LEVELS.includes(level)) this.level = level;
		if (typeof color === 'boolean') this.useColor = color;
		if (typeof compact === 'boolean') this.compact = compact;
		if (typeof show_metadata === 'boolean') this.showMetadata = show_metadata;
	}

	async log(entry: LogEntry): Promise<void> {
		try {
			if (!shouldLog(entry.phase, this.level)) return;

			const formatted = this.compact
				? formatCompact(entry, this.useColor)
				: formatVerbose(entry, this.useColor, this.showMetadata);

			process.stderr.write(`${formatted}\n`);
		} catch {
			// Loggers must not throw
		}
	}

	async flush(): Promise<void> {
		// Console output is unbuffered — nothing to flush
	}

	async shutdown(): Promise<void> {
		// No resources to clean up
	}
}
