import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config.js';
import { getProductionContainer } from '../src/container.production.js';

describe('loadConfig', () => {
  it('should fall back to defaults for unset values', () => {
    expect(loadConfig({})).toEqual({
      supabaseUrl: null,
      supabaseServiceRoleKey: null,
      axiomApiKey: null,
      axiomDataset: null,
      transactionTimeoutMs: 5_000,
      transactionMaxAttempts: 5,
      notifyMaxAttempts: 3,
      notifyBackoffMs: 200,
    });
  });

  it('should read and trim provided values', () => {
    const config = loadConfig({
      SUPABASE_URL: ' http://localhost:54321 ',
      SUPABASE_SERVICE_ROLE_KEY: 'test-secret',
      AXIOM_DATASET: '   ',
      TRANSACTION_TIMEOUT_MS: '2500',
      NOTIFY_BACKOFF_MS: '0',
    });

    expect(config).toMatchObject({
      supabaseUrl: 'http://localhost:54321',
      supabaseServiceRoleKey: 'test-secret',
      axiomDataset: null,
      transactionTimeoutMs: 2_500,
      notifyBackoffMs: 0,
    });
  });

  it('should reject malformed numbers', () => {
    expect(() => loadConfig({ TRANSACTION_MAX_ATTEMPTS: 'three' })).toThrow(
      'TRANSACTION_MAX_ATTEMPTS must be an integer >= 1, got "three"'
    );
    expect(() => loadConfig({ NOTIFY_MAX_ATTEMPTS: '0' })).toThrow(
      'NOTIFY_MAX_ATTEMPTS must be an integer >= 1, got "0"'
    );
    expect(() => loadConfig({ NOTIFY_BACKOFF_MS: '1.5' })).toThrow(
      'NOTIFY_BACKOFF_MS must be an integer >= 0, got "1.5"'
    );
  });
});

describe('getProductionContainer', () => {
  it('should require the Supabase settings', () => {
    expect(() => getProductionContainer({ SUPABASE_URL: 'http://localhost:54321' })).toThrow(
      'Missing required environment variables: SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY'
    );
  });
});
