/**
 * Discord transport — posts each message to one channel through the bot API.
 */

import { ConfigurationError, TransportError } from '@relaylog/core';
import type { HttpAgent, SendOutcome, Transport } from '@relaylog/sdk';
import { closeHttpAgent, createFetchWithKeepAlive, createHttpAgent } from '@relaylog/sdk';

export const DEFAULT_API_BASE = 'https://discord.com/api/v10';
/** Wait used when a 429 body carries no usable retry_after */
export const DEFAULT_RETRY_AFTER_MS = 1_000;
const MAX_ERROR_BODY_LENGTH = 300;

export interface DiscordTransportConfig {
	/** Bot token (sent as "Bot <token>") */
	token: string;
	/** Channel the messages are posted to */
	channel_id: string;
	/** API base URL (default: https://discord.com/api/v10) */
	api_base?: string;
	/** Per-request timeout in milliseconds (default: 15000) */
	request_timeout?: number;
}

export class DiscordTransport implements Transport {
	readonly id = 'discord';
	private readonly url: string;
	private readonly authHeader: string;
	private readonly agent: HttpAgent;
	private readonly post: typeof globalThis.fetch;

	constructor(config: DiscordTransportConfig) {
		if (!config.token) {
			throw new ConfigurationError('token', 'Discord bot token is required (DISCORD_BOT_TOKEN)');
		}
		if (!config.channel_id) {
			throw new ConfigurationError(
				'channel_id',
				'Discord channel ID is required (DISCORD_LOG_CHANNELID)',
			);
		}

		const base = (config.api_base ?? DEFAULT_API_BASE).replace(/\/+$/, '');
		this.url = `${base}/channels/${encodeURIComponent(config.channel_id)}/messages`;
		this.authHeader = `Bot ${config.token}`;
		this.agent = createHttpAgent({ requestTimeout: config.request_timeout });
		this.post = createFetchWithKeepAlive(this.agent);
	}

	async send(text: string): Promise<SendOutcome> {
		let response: Response;
		try {
			response = await this.post(this.url, {
				method: 'POST',
				headers: {
					Authorization: this.authHeader,
					'Content-Type': 'application/json',
				},
				body: JSON.stringify({ content: text }),
			});
		} catch (err) {
			return {
				status: 'failed',
				error: new TransportError(this.id, `Request failed: ${errorMessage(err)}`, {
					cause: err,
				}),
			};
		}

		if (response.status === 200 || response.status === 201) {
			// The created message echoed back is not needed; release the socket
			await discardBody(response);
			return { status: 'delivered' };
		}

		const body = await readBody(response);

		if (response.status === 429) {
			const retryAfterMs = parseRetryAfter(body);
			return {
				status: 'rate_limited',
				retryAfterMs,
				error: new TransportError(this.id, `Rate limited (429), retrying in ${retryAfterMs}ms`, {
					httpStatus: 429,
				}),
			};
		}

		const detail = body ? `: ${body.slice(0, MAX_ERROR_BODY_LENGTH)}` : '';
		return {
			status: 'failed',
			httpStatus: response.status,
			error: new TransportError(
				this.id,
				`Discord API error: ${response.status} ${response.statusText}${detail}`,
				{ httpStatus: response.status },
			),
		};
	}

	async shutdown(): Promise<void> {
		await closeHttpAgent(this.agent);
	}
}

/**
 * Milliseconds to wait from a 429 body like {"retry_after": 0.35}.
 * A numeric string counts as its number. Anything unparseable, missing or
 * negative gives DEFAULT_RETRY_AFTER_MS.
 */
export function parseRetryAfter(body: string): number {
	let parsed: unknown;
	try {
		parsed = JSON.parse(body);
	} catch {
		return DEFAULT_RETRY_AFTER_MS;
	}
	if (parsed === null || typeof parsed !== 'object' || !('retry_after' in parsed)) {
		return DEFAULT_RETRY_AFTER_MS;
	}
	const raw = parsed.retry_after;
	const seconds = typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : raw;
	if (typeof seconds !== 'number' || !Number.isFinite(seconds) || seconds < 0) {
		return DEFAULT_RETRY_AFTER_MS;
	}
	return Math.ceil(seconds * 1000);
}

async function readBody(response: Response): Promise<string> {
	try {
		return await response.text();
	} catch {
		// Body stream already broken; the status alone classifies the send
		return '';
	}
}

async function discardBody(response: Response): Promise<void> {
	try {
		await response.body?.cancel();
	} catch (err) {
		// The send already succeeded; a broken stream only costs the socket
		process.emitWarning(`Could not discard Discord response body: ${errorMessage(err)}`);
	}
}

function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
