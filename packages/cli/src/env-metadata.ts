/**
 * Environment variable metadata, collected from the transport registration.
 */

import type { EnvVarDefinition } from '@relaylog/sdk';
import registerDiscord from '@relaylog/transport-discord';

const ENV_VARS: EnvVarDefinition[] = registerDiscord().setup?.env_vars ?? [];

export function listEnvVars(): EnvVarDefinition[] {
	return [...ENV_VARS];
}
