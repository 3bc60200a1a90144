/**
 * @relaylog/transport-discord — Discord channel transport registration.
 */

import type { TransportRegistration } from '@relaylog/sdk';
import { DiscordTransport, type DiscordTransportConfig } from './transport.js';

export {
	DEFAULT_API_BASE,
	DEFAULT_RETRY_AFTER_MS,
	DiscordTransport,
	type DiscordTransportConfig,
	parseRetryAfter,
} from './transport.js';

export const configSchema = {
	type: 'object',
	required: ['token', 'channel_id'],
	properties: {
		token: { type: 'string', minLength: 1 },
		channel_id: { type: 'string', pattern: '^[0-9]+$' },
		api_base: { type: 'string', pattern: '^https?://' },
		request_timeout: { type: 'integer', minimum: 1 },
	},
	additionalProperties: false,
};

export default function register(): TransportRegistration<DiscordTransportConfig> {
	return {
		id: 'discord',
		create: (config) => new DiscordTransport(config),
		configSchema,
		setup: {
			env_vars: [
				{
					name: 'DISCORD_BOT_TOKEN',
					description: 'Bot token used to post messages',
					help_url: 'https://discord.com/developers/applications',
				},
				{
					name: 'DISCORD_LOG_CHANNELID',
					description: 'ID of the channel that receives the messages',
					help_url:
						'https://support.discord.com/hc/en-us/articles/206346498-Where-can-I-find-my-User-Server-Message-ID',
				},
				{
					name: 'DISCORD_ADMIN_USERID',
					description: 'User mentioned on every error message',
					required: false,
				},
			],
		},
	};
}
