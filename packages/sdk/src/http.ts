/**
 * HTTP connection management for transports.
 *
 * Keep-alive pooling via an undici Agent, plus request timeouts so a hung
 * endpoint turns into a failed send instead of a stalled dispatcher.
 * A transport creates its agent in its constructor and closes it in shutdown().
 */

import { Agent, type Dispatcher } from 'undici';

/**
 * Opaque handle for an HTTP connection pool agent.
 */
export type HttpAgent = Dispatcher;

export interface HttpAgentOptions {
	/** Max connections per origin (default: 4) */
	connections?: number;
	/** Keep-alive timeout in milliseconds (default: 30000) */
	keepAliveTimeout?: number;
	/** Max keep-alive timeout in milliseconds (default: 60000) */
	keepAliveMaxTimeout?: number;
	/** Headers and body timeout in milliseconds (default: 15000) */
	requestTimeout?: number;
}

const DEFAULTS: Required<HttpAgentOptions> = {
	connections: 4,
	keepAliveTimeout: 30_000,
	keepAliveMaxTimeout: 60_000,
	requestTimeout: 15_000,
};

/**
 * Create an undici Agent with keep-alive connection pooling.
 *
 * ```ts
 * const agent = createHttpAgent({ requestTimeout: 5_000 });
 * const post = createFetchWithKeepAlive(agent);
 * // On shutdown:
 * await closeHttpAgent(agent);
 * ```
 */
export function createHttpAgent(options?: HttpAgentOptions): HttpAgent {
	const requestTimeout = options?.requestTimeout ?? DEFAULTS.requestTimeout;
	return new Agent({
		keepAliveTimeout: options?.keepAliveTimeout ?? DEFAULTS.keepAliveTimeout,
		keepAliveMaxTimeout: options?.keepAliveMaxTimeout ?? DEFAULTS.keepAliveMaxTimeout,
		connections: options?.connections ?? DEFAULTS.connections,
		headersTimeout: requestTimeout,
		bodyTimeout: requestTimeout,
	});
}

/**
 * Create a fetch function that routes through the given agent.
 */
export function createFetchWithKeepAlive(agent: HttpAgent): typeof globalThis.fetch {
	return ((input: string | URL | Request, init?: RequestInit) => {
		return globalThis.fetch(input, {
			...init,
			dispatcher: agent,
		} as unknown as RequestInit);
	}) as typeof globalThis.fetch;
}

/**
 * Gracefully close an HTTP agent, draining active connections.
 */
export async function closeHttpAgent(agent: HttpAgent): Promise<void> {
	await agent.close();
}
