/**
 * CLI configuration — resolved once at startup.
 *
 * Layers, lowest precedence first:
 *   1. .env in the working directory (parsed, never written to process.env)
 *   2. the process environment
 *   3. relaylog.yaml (or --config), whose strings may reference ${ENV_VAR}
 *
 * The merged result is checked against CONFIG_SCHEMA with ajv.
 */

import { readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import {
	ConfigurationError,
	DEFAULT_FLUSH_POLL_INTERVAL_MS,
	DEFAULT_FORCED_FLUSH_TIMEOUT_MS,
} from '@relaylog/core';
import type { LogLevel } from '@relaylog/sdk';
import { parseDuration } from '@relaylog/sdk';
import type { DiscordTransportConfig } from '@relaylog/transport-discord';
import { Ajv, type ErrorObject } from 'ajv';
import { parse as parseDotenv } from 'dotenv';
import yaml from 'js-yaml';

export const DEFAULT_CONFIG_FILE = 'relaylog.yaml';

export interface CliConfig {
	transport: DiscordTransportConfig;
	/** User mentioned on error messages; absent disables mentions */
	escalation_target?: string;
	flush: {
		poll_interval_ms: number;
		forced_timeout_ms: number;
	};
	logger: {
		level: LogLevel;
		color?: boolean;
	};
	/** Files that contributed to this config */
	files: string[];
}

export interface LoadConfigOptions {
	/** Explicit config file; must exist when given */
	configPath?: string;
	/** Directory searched for .env and relaylog.yaml (default: process.cwd()) */
	cwd?: string;
	/** Environment layer (default: process.env) */
	env?: Record<string, string | undefined>;
}

/** Shape of the merged layers before durations are normalized */
interface RawConfig {
	transport: {
		token: string;
		channel_id: string;
		api_base?: string;
		request_timeout?: string | number;
	};
	escalation_target?: string;
	flush?: {
		poll_interval?: string | number;
		forced_timeout?: string | number;
	};
	logger?: {
		level?: LogLevel;
		color?: boolean;
	};
}

const DURATION = { type: ['string', 'number'], exclusiveMinimum: 0, minLength: 1 };

export const CONFIG_SCHEMA = {
	type: 'object',
	required: ['transport'],
	properties: {
		transport: {
			type: 'object',
			required: ['token', 'channel_id'],
			properties: {
				token: { type: 'string', minLength: 1 },
				channel_id: { type: 'string', minLength: 1 },
				api_base: { type: 'string' },
				request_timeout: DURATION,
			},
			additionalProperties: false,
		},
		escalation_target: { type: 'string' },
		flush: {
			type: 'object',
			properties: {
				poll_interval: DURATION,
				forced_timeout: DURATION,
			},
			additionalProperties: false,
		},
		logger: {
			type: 'object',
			properties: {
				level: { type: 'string', enum: ['debug', 'info', 'warn', 'error'] },
				color: { type: 'boolean' },
			},
			additionalProperties: false,
		},
	},
	additionalProperties: false,
};

/** Environment variable behind each setting that has one */
const ENV_SOURCES: Record<string, string> = {
	'transport.token': 'DISCORD_BOT_TOKEN',
	'transport.channel_id': 'DISCORD_LOG_CHANNELID',
	escalation_target: 'DISCORD_ADMIN_USERID',
};

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });
const validateRaw = ajv.compile<RawConfig>(CONFIG_SCHEMA);

// ─── Public API ──────────────────────────────────────────────────────────────

export function resolveConfigPath(configPath?: string, cwd = process.cwd()): string {
	return resolve(cwd, configPath ?? DEFAULT_CONFIG_FILE);
}

export async function loadCliConfig(options: LoadConfigOptions = {}): Promise<CliConfig> {
	const cwd = options.cwd ?? process.cwd();
	const files: string[] = [];

	// Layers 1 + 2
	const envPath = join(cwd, '.env');
	const envFile = await readOptional(envPath);
	const env: Record<string, string> = envFile === undefined ? {} : parseDotenv(envFile);
	if (envFile !== undefined) files.push(envPath);
	for (const [name, value] of Object.entries(options.env ?? process.env)) {
		if (value !== undefined) env[name] = value;
	}

	let merged: Record<string, unknown> = stripUndefined({
		transport: {
			token: env.DISCORD_BOT_TOKEN,
			channel_id: env.DISCORD_LOG_CHANNELID,
		},
		escalation_target: env.DISCORD_ADMIN_USERID,
	});

	// Layer 3
	const configPath = resolveConfigPath(options.configPath, cwd);
	const configFile = await readOptional(configPath);
	if (configFile === undefined && options.configPath) {
		throw new ConfigurationError('config', `Config file not found: ${configPath}`);
	}
	if (configFile !== undefined) {
		const document = parseYamlDocument(configFile, configPath);
		merged = mergeLayers(merged, resolveEnvRefs(document, env, ''));
		files.push(configPath);
	}

	if (!validateRaw(merged)) {
		throw toConfigurationError(validateRaw.errors ?? []);
	}
	const raw = merged;

	return {
		transport: {
			token: raw.transport.token,
			channel_id: raw.transport.channel_id,
			api_base: raw.transport.api_base,
			request_timeout: toMilliseconds('transport.request_timeout', raw.transport.request_timeout),
		},
		escalation_target: raw.escalation_target || undefined,
		flush: {
			poll_interval_ms:
				toMilliseconds('flush.poll_interval', raw.flush?.poll_interval) ??
				DEFAULT_FLUSH_POLL_INTERVAL_MS,
			forced_timeout_ms:
				toMilliseconds('flush.forced_timeout', raw.flush?.forced_timeout) ??
				DEFAULT_FORCED_FLUSH_TIMEOUT_MS,
		},
		logger: {
			level: raw.logger?.level ?? 'info',
			color: raw.logger?.color,
		},
		files,
	};
}

/**
 * Check data against a JSON schema, throwing a ConfigurationError that
 * lists every violation.
 */
export function validateAgainstSchema(
	schema: Record<string, unknown>,
	data: unknown,
	label: string,
): void {
	const validate = ajv.compile(schema);
	if (!validate(data)) {
		const details = (validate.errors ?? [])
			.map((e) => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`)
			.join('; ');
		throw new ConfigurationError(label, `${label} config is invalid: ${details}`);
	}
}

// ─── Internals ───────────────────────────────────────────────────────────────

async function readOptional(path: string): Promise<string | undefined> {
	try {
		return await readFile(path, 'utf-8');
	} catch (err) {
		if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return undefined;
		throw err;
	}
}

function parseYamlDocument(text: string, path: string): Record<string, unknown> {
	let document: unknown;
	try {
		document = yaml.load(text);
	} catch (err) {
		throw new ConfigurationError(
			'config',
			`Invalid YAML in ${path}: ${err instanceof Error ? err.message : String(err)}`,
			{ cause: err },
		);
	}
	if (document === undefined || document === null) return {};
	if (!isPlainObject(document)) {
		throw new ConfigurationError('config', `${path} must contain a mapping at the top level`);
	}
	return document;
}

/** Replace ${VAR} references in every string value */
function resolveEnvRefs(value: unknown, env: Record<string, string>, path: string): unknown {
	if (typeof value === 'string') {
		return value.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_match, name: string) => {
			const resolved = env[name];
			if (resolved === undefined) {
				throw new ConfigurationError(
					path,
					`Environment variable ${name} is not set (referenced by ${path})`,
				);
			}
			return resolved;
		});
	}
	if (Array.isArray(value)) {
		return value.map((item, i) => resolveEnvRefs(item, env, `${path}[${i}]`));
	}
	if (isPlainObject(value)) {
		const result: Record<string, unknown> = {};
		for (const [key, child] of Object.entries(value)) {
			result[key] = resolveEnvRefs(child, env, path ? `${path}.${key}` : key);
		}
		return result;
	}
	return value;
}

/** Deep merge; the override wins on conflicts */
function mergeLayers(base: Record<string, unknown>, override: unknown): Record<string, unknown> {
	if (!isPlainObject(override)) return base;
	const result: Record<string, unknown> = { ...base };
	for (const [key, value] of Object.entries(override)) {
		const current = result[key];
		result[key] =
			isPlainObject(current) && isPlainObject(value) ? mergeLayers(current, value) : value;
	}
	return result;
}

function stripUndefined(value: Record<string, unknown>): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	for (const [key, child] of Object.entries(value)) {
		if (child === undefined) continue;
		result[key] = isPlainObject(child) ? stripUndefined(child) : child;
	}
	return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toMilliseconds(field: string, value: string | number | undefined): number | undefined {
	if (value === undefined) return undefined;
	if (typeof value === 'number') return value;
	try {
		return parseDuration(value);
	} catch (err) {
		throw new ConfigurationError(
			field,
			`${field}: ${err instanceof Error ? err.message : String(err)}`,
			{ cause: err },
		);
	}
}

function toConfigurationError(errors: ErrorObject[]): ConfigurationError {
	const messages = errors.map((e) => {
		const segments = e.instancePath.split('/').filter(Boolean);
		if (e.keyword === 'required' && typeof e.params.missingProperty === 'string') {
			segments.push(e.params.missingProperty);
		}
		const field = segments.join('.') || 'config';
		const envName = ENV_SOURCES[field];
		if (envName && (e.keyword === 'required' || e.keyword === 'minLength')) {
			return { field, text: `${field} is not set (set ${envName})` };
		}
		return { field, text: `${field} ${e.message ?? 'is invalid'}` };
	});
	const first = messages[0]?.field ?? 'config';
	return new ConfigurationError(first, messages.map((m) => m.text).join('; '));
}
