/**
 * @relaylog/sdk — shared contracts for the relaylog delivery pipeline.
 */

export type {
	DeliveredOutcome,
	FailedOutcome,
	LogEntry,
	LogLevel,
	LogPhase,
	OutboundMessage,
	RateLimitedOutcome,
	SendOutcome,
	Severity,
} from './types.js';
export { SEVERITIES, isSeverity, parseDuration } from './types.js';

export type { FormatOptions } from './format.js';
export {
	SEVERITY_LABELS,
	SEVERITY_MARKERS,
	formatMessage,
	formatTimestamp,
	generateMessageId,
	mentionToken,
} from './format.js';

export type { Logger, LoggerRegistration } from './logger.js';
export { PHASE_LEVELS } from './logger.js';

export type {
	EnvVarDefinition,
	Transport,
	TransportRegistration,
	TransportSetup,
} from './transport.js';

export type { HttpAgent, HttpAgentOptions } from './http.js';
export { closeHttpAgent, createFetchWithKeepAlive, createHttpAgent } from './http.js';

export type { MockSendHandler } from './testing.js';
export { MockLogger, MockTransport, createTestMessage } from './testing.js';
