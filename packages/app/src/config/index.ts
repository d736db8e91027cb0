/**
 * Configuration loading and management
 */

import { ConfigError } from '@mdpoc/contracts';
import { configSchema, envMapping, type Config } from './schema.js';

export { configSchema, envMapping, type Config } from './schema.js';

type RawConfig = Record<string, unknown>;

function isRawConfig(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Set nested property in object
 */
function setNestedProperty(target: RawConfig, path: string, value: unknown): void {
  const keys = path.split('.');
  const lastKey = keys.pop();
  if (!lastKey) {
    return;
  }

  let current = target;
  for (const key of keys) {
    const next = current[key];
    if (isRawConfig(next)) {
      current = next;
    } else {
      const created: RawConfig = {};
      current[key] = created;
      current = created;
    }
  }

  current[lastKey] = value;
}

/**
 * Load configuration from environment and defaults.
 *
 * Empty variables count as unset. Numeric settings are coerced by the schema.
 *
 * @throws {ConfigError} If a setting fails validation; `data.issues` lists each as `path: message`
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig: RawConfig = {};

  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      setNestedProperty(rawConfig, configPath, value);
    }
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`, { issues });
  }

  return result.data;
}

/**
 * Settings worth logging at startup
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    logLevel: config.logging.level,
    rosterUrl: config.roster.url,
    provider: config.provider.type,
    concurrency: config.batch.concurrency,
  };
}
