/**
 * Line formatting for the console logger.
 */

import type { LogEntry, LogLevel, LogPhase } from '@relaylog/sdk';
import { PHASE_LEVELS } from '@relaylog/sdk';

// ─── ANSI ─────────────────────────────────────────────────────────────────────

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';
const RED = '\x1b[31m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const CYAN = '\x1b[36m';

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

const PHASE_ICONS: Record<LogPhase, string> = {
	'system.start': '\u25cf', // ●
	'system.stop': '\u25cf',
	'system.error': '\u26a0', // ⚠
	'message.enqueue': '\u25cb', // ○
	'deliver.attempt': '\u25b7', // ▷
	'deliver.success': '\u2713', // ✓
	'deliver.retry': '\u21bb', // ↻
	'deliver.failure': '\u2717', // ✗
	'dispatch.idle': '\u25e6', // ◦
	'flush.start': '\u25c6', // ◆
	'flush.complete': '\u25c6',
	'flush.timeout': '\u26a0',
};

const PHASE_WIDTH = 15;

function isLogLevel(value: string): value is LogLevel {
	return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Whether a phase is shown at the given minimum level.
 * Unknown phases and levels are always shown.
 */
export function shouldLog(phase: LogPhase, level: string): boolean {
	const phaseLevel: LogLevel | undefined = PHASE_LEVELS[phase];
	if (!phaseLevel || !isLogLevel(level)) return true;
	return LEVEL_ORDER[phaseLevel] >= LEVEL_ORDER[level];
}

function phaseColor(phase: LogPhase): string {
	switch (PHASE_LEVELS[phase]) {
		case 'error':
			return RED;
		case 'warn':
			return YELLOW;
		case 'debug':
			return DIM;
		default:
			return phase === 'deliver.success' ? GREEN : CYAN;
	}
}

function paint(text: string, code: string, color: boolean): string {
	return color ? `${code}${text}${RESET}` : text;
}

/** HH:MM:SS.mmm in local time */
function formatTime(timestamp: string): string {
	const date = new Date(timestamp);
	if (Number.isNaN(date.getTime())) return timestamp;
	const pad = (n: number, width = 2) => String(n).padStart(width, '0');
	return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.${pad(date.getMilliseconds(), 3)}`;
}

/**
 * One line per entry:
 *   09:05:07.042 ↻ deliver.retry   msg=msg_… origin=clan-sync via=discord attempt=1 delay=500ms status=429
 */
export function formatCompact(entry: LogEntry, color: boolean): string {
	const fields: string[] = [];
	if (entry.message_id) fields.push(`msg=${entry.message_id}`);
	if (entry.origin) fields.push(`origin=${entry.origin}`);
	if (entry.severity) fields.push(`sev=${entry.severity}`);
	if (entry.transport) fields.push(`via=${entry.transport}`);
	if (entry.attempt !== undefined) fields.push(`attempt=${entry.attempt}`);
	if (entry.delay_ms !== undefined) fields.push(`delay=${entry.delay_ms}ms`);
	if (entry.duration_ms !== undefined) fields.push(`${entry.duration_ms}ms`);
	if (entry.http_status !== undefined) fields.push(`status=${entry.http_status}`);
	if (entry.queue_depth) fields.push(`queue=${entry.queue_depth}`);
	if (entry.result) fields.push(`result=${entry.result}`);
	if (entry.error) fields.push(paint(`err=${entry.error}`, RED, color));

	const icon = PHASE_ICONS[entry.phase] ?? '\u00b7';
	const phase = fields.length > 0 ? entry.phase.padEnd(PHASE_WIDTH) : entry.phase;
	const head = paint(`${icon} ${phase}`, phaseColor(entry.phase), color);

	return [paint(formatTime(entry.timestamp), DIM, color), head, ...fields].join(' ');
}

/**
 * Compact line, followed by the entry's metadata when requested.
 */
export function formatVerbose(entry: LogEntry, color: boolean, showMetadata: boolean): string {
	const line = formatCompact(entry, color);
	if (!showMetadata || !entry.metadata || Object.keys(entry.metadata).length === 0) {
		return line;
	}
	const json = JSON.stringify(entry.metadata, null, 2).replace(/\n/g, '\n    ');
	return `${line}\n${paint(`  metadata: ${json}`, DIM, color)}`;
}
