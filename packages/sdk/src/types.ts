/**
 * Core relaylog types — messages, outcomes, diagnostics.
 */

// ─── Severity ─────────────────────────────────────────────────────────────────

export type Severity = 'log' | 'info' | 'success' | 'warning' | 'error';

export const SEVERITIES: readonly Severity[] = ['log', 'info', 'success', 'warning', 'error'];

export function isSeverity(value: string): value is Severity {
	return (SEVERITIES as readonly string[]).includes(value);
}

// ─── Messages ─────────────────────────────────────────────────────────────────

/** A formatted message waiting for (or past) delivery. Frozen once created. */
export interface OutboundMessage {
	/** Diagnostic ID (msg_ prefix) */
	readonly id: string;
	/** Fully formatted line, exactly as it will be posted */
	readonly text: string;
	readonly severity: Severity;
	/** Logical producer that submitted the message */
	readonly origin: string;
	/** Epoch milliseconds at enqueue time */
	readonly submittedAt: number;
}

// ─── Send outcomes ────────────────────────────────────────────────────────────

export interface DeliveredOutcome {
	status: 'delivered';
}

export interface RateLimitedOutcome {
	status: 'rate_limited';
	/** How long the endpoint asked us to wait before retrying the same message */
	retryAfterMs: number;
	error?: Error;
}

export interface FailedOutcome {
	status: 'failed';
	error: Error;
	/** HTTP status, when the endpoint answered at all */
	httpStatus?: number;
}

/** Classification of a single send attempt. */
export type SendOutcome = DeliveredOutcome | RateLimitedOutcome | FailedOutcome;

// ─── Diagnostics ──────────────────────────────────────────────────────────────

export type LogPhase =
	| 'system.start'
	| 'system.stop'
	| 'system.error'
	| 'message.enqueue'
	| 'deliver.attempt'
	| 'deliver.success'
	| 'deliver.retry'
	| 'deliver.failure'
	| 'dispatch.idle'
	| 'flush.start'
	| 'flush.complete'
	| 'flush.timeout';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Structured diagnostic record emitted for every pipeline phase. */
export interface LogEntry {
	timestamp: string;
	phase: LogPhase;
	message_id?: string;
	origin?: string;
	severity?: Severity;
	transport?: string;
	attempt?: number;
	delay_ms?: number;
	duration_ms?: number;
	http_status?: number;
	result?: string;
	error?: string;
	queue_depth?: number;
	metadata?: Record<string, unknown>;
}

// ─── Duration parsing ─────────────────────────────────────────────────────────

const DURATION_UNITS: Record<string, number> = {
	ms: 1,
	s: 1_000,
	m: 60_000,
	h: 3_600_000,
	d: 86_400_000,
};

/**
 * Parse a duration string like "100ms", "5s", "2m" into milliseconds.
 */
export function parseDuration(value: string): number {
	const match = value.trim().match(/^(\d+(?:\.\d+)?)(ms|s|m|h|d)$/);
	if (!match) {
		throw new Error(`Invalid duration format: "${value}" (expected e.g. 100ms, 5s, 2m)`);
	}
	return Math.round(Number.parseFloat(match[1]) * DURATION_UNITS[match[2]]);
}
