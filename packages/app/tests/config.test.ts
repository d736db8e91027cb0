/**
 * Tests for configuration loading
 */

import { describe, it, expect } from 'vitest';
import { isPipelineError } from '@mdpoc/contracts';
import { getConfigSummary, loadConfig } from '../src/config/index.js';

function configIssues(env: NodeJS.ProcessEnv): string[] {
  try {
    loadConfig(env);
  } catch (error) {
    if (isPipelineError(error) && error.code === 'CONFIG_ERROR') {
      const issues = error.data?.['issues'];
      return Array.isArray(issues) ? issues.map(String) : [];
    }
    throw error;
  }
  throw new Error('Expected loadConfig to throw');
}

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      logging: { level: 'info', format: 'pretty' },
      roster: { url: 'https://stockanalysis.com/list/sp-500-stocks/', timeoutMs: 10000 },
      provider: { type: 'yahoo', timeoutMs: 10000 },
      batch: { concurrency: 1 },
    });
  });

  it('should map and coerce environment variables', () => {
    const config = loadConfig({
      LOG_LEVEL: 'debug',
      LOG_FORMAT: 'json',
      ROSTER_URL: 'https://example.test/list/',
      ROSTER_TIMEOUT_MS: '2500',
      ROSTER_USER_AGENT: 'test-agent/1.0',
      PROVIDER_TYPE: 'fixture',
      FIXTURES_PATH: '/srv/fixtures',
      BATCH_CONCURRENCY: '4',
    });

    expect(config.logging).toEqual({ level: 'debug', format: 'json' });
    expect(config.roster).toEqual({ url: 'https://example.test/list/', timeoutMs: 2500, userAgent: 'test-agent/1.0' });
    expect(config.provider).toEqual({ type: 'fixture', timeoutMs: 10000, fixturesPath: '/srv/fixtures' });
    expect(config.batch.concurrency).toBe(4);
  });

  it('should treat empty variables as unset', () => {
    expect(loadConfig({ LOG_LEVEL: '', BATCH_CONCURRENCY: '' }).logging.level).toBe('info');
  });

  it('should ignore unrelated variables', () => {
    expect(loadConfig({ HOME: '/root', PATH: '/usr/bin' }).provider.type).toBe('yahoo');
  });

  it('should reject an unknown log level', () => {
    const issues = configIssues({ LOG_LEVEL: 'verbose' });

    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^logging\.level: /);
  });

  it('should reject a non-numeric or zero concurrency', () => {
    expect(configIssues({ BATCH_CONCURRENCY: 'many' })[0]).toMatch(/^batch\.concurrency: /);
    expect(configIssues({ BATCH_CONCURRENCY: '0' })[0]).toMatch(/^batch\.concurrency: /);
  });

  it('should reject an invalid roster URL', () => {
    expect(configIssues({ ROSTER_URL: 'not a url' })[0]).toBe('roster.url: Invalid url');
  });

  it('should require a fixtures path in fixture mode', () => {
    expect(configIssues({ PROVIDER_TYPE: 'fixture' })).toEqual([
      'provider.fixturesPath: FIXTURES_PATH is required when PROVIDER_TYPE is fixture',
    ]);
  });

  it('should list every issue in the error message', () => {
    let message = '';
    try {
      loadConfig({ LOG_FORMAT: 'xml', PROVIDER_TIMEOUT_MS: '-5' });
    } catch (error) {
      message = error instanceof Error ? error.message : '';
    }

    expect(message.split('\n')[0]).toBe('Configuration validation failed:');
    expect(message.split('\n')).toHaveLength(3);
  });

});

describe('getConfigSummary', () => {
  it('should pick the settings logged at startup', () => {
    const config = loadConfig({ PROVIDER_TYPE: 'fixture', FIXTURES_PATH: '/srv/fixtures' });

    expect(getConfigSummary(config)).toEqual({
      logLevel: 'info',
      rosterUrl: config.roster.url,
      provider: 'fixture',
      concurrency: 1,
    });
  });
});
