/**
 * Transport interfaces — the contract between relaylog and a chat endpoint.
 *
 * A transport performs exactly one network call per send() and classifies
 * the result. It never retries on its own: rate-limit handling belongs to
 * the dispatcher, which owns ordering.
 */

import type { SendOutcome } from './types.js';

// ─── Transport ────────────────────────────────────────────────────────────────

export interface Transport {
	/** Unique transport ID */
	readonly id: string;

	/**
	 * Post one formatted message.
	 * Should resolve with a failed outcome instead of throwing.
	 */
	send(text: string): Promise<SendOutcome>;

	/** Release connections and timers */
	shutdown(): Promise<void>;
}

// ─── Registration ─────────────────────────────────────────────────────────────

/**
 * Rich definition for an environment variable a transport reads.
 *
 * The CLI uses this to explain missing configuration.
 */
export interface EnvVarDefinition {
	/** Environment variable name */
	name: string;
	/** Human-readable description of what this var is for */
	description: string;
	/** URL where the user can get/create this credential */
	help_url?: string;
	/** Whether this var is required (default: true) */
	required?: boolean;
}

export interface TransportSetup {
	env_vars?: EnvVarDefinition[];
}

/**
 * Transport registration — what a transport package exports.
 *
 * The package's default export is a function returning this object.
 */
export interface TransportRegistration<TConfig = Record<string, unknown>> {
	/** Unique transport ID */
	id: string;
	/** Construct a transport; throws when the config is unusable */
	create(config: TConfig): Transport;
	/** JSON Schema for config validation */
	configSchema?: Record<string, unknown>;
	/** Onboarding metadata */
	setup?: TransportSetup;
}
