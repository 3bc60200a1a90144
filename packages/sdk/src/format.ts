/**
 * Message formatting — the exact text posted to the chat endpoint.
 *
 *   🔵 [2026-03-04 09:05:07.042] [clan-sync] INFO: fetched 42 members
 *
 * The origin is always supplied by the caller; nothing here looks at the
 * call stack.
 */

import { randomUUID } from 'node:crypto';
import type { Severity } from './types.js';

export const SEVERITY_MARKERS: Readonly<Record<Severity, string>> = {
	log: '\u{1F4DD}', // 📝
	info: '\u{1F535}', // 🔵
	success: '\u{1F7E2}', // 🟢
	warning: '\u{1F7E1}', // 🟡
	error: '\u{1F534}', // 🔴
};

export const SEVERITY_LABELS: Readonly<Record<Severity, string>> = {
	log: 'LOG',
	info: 'INFO',
	success: 'SUCCESS',
	warning: 'WARNING',
	error: 'ERROR',
};

export interface FormatOptions {
	/** User ID mentioned in front of error lines. Empty or absent disables it. */
	escalationTarget?: string;
	/** Clock override */
	now?: Date;
}

function pad(value: number, width = 2): string {
	return String(value).padStart(width, '0');
}

/** Local time as yyyy-MM-dd HH:mm:ss.mmm */
export function formatTimestamp(date: Date): string {
	const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
	const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
	return `${day} ${time}.${pad(date.getMilliseconds(), 3)}`;
}

export function mentionToken(userId: string): string {
	return `<@${userId}>`;
}

export function formatMessage(
	severity: Severity,
	text: string,
	origin: string,
	options: FormatOptions = {},
): string {
	const timestamp = formatTimestamp(options.now ?? new Date());
	const line = `${SEVERITY_MARKERS[severity]} [${timestamp}] [${origin}] ${SEVERITY_LABELS[severity]}: ${text}`;

	if (severity === 'error' && options.escalationTarget) {
		return `${mentionToken(options.escalationTarget)} ${line}`;
	}
	return line;
}

/**
 * Generate a message ID with the msg_ prefix.
 */
export function generateMessageId(): string {
	return `msg_${randomUUID().replace(/-/g, '').substring(0, 16)}`;
}
