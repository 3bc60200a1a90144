import { describe, expect, it } from 'vitest';
import { listEnvVars } from '../env-metadata.js';

describe('listEnvVars', () => {
	it('lists every variable the transport reads', () => {
		expect(listEnvVars().map((v) => v.name)).toEqual([
			'DISCORD_BOT_TOKEN',
			'DISCORD_LOG_CHANNELID',
			'DISCORD_ADMIN_USERID',
		]);
	});

	it('links the bot token to the developer portal', () => {
		const token = listEnvVars().find((v) => v.name === 'DISCORD_BOT_TOKEN');
		expect(token?.help_url).toContain('discord.com');
	});

	it('marks the mention ID as optional', () => {
		const mention = listEnvVars().find((v) => v.name === 'DISCORD_ADMIN_USERID');
		expect(mention?.required).toBe(false);
	});

	it('returns a copy', () => {
		listEnvVars().pop();
		expect(listEnvVars()).toHaveLength(3);
	});
});
