/**
 * Environment validation
 */

import { readFileSync } from 'node:fs';
import { parse } from 'dotenv';
import { describe, it, expect } from 'vitest';
import { loadEnv } from '../env.js';

const EXAMPLE_ENV = parse(readFileSync(new URL('../../../.env.example', import.meta.url)));

const REQUIRED = { API_AUTH_TOKEN: 'test-secret', DEFAULT_HOTKEY: 'H1' };

describe('loadEnv', () => {
  it('should apply defaults', () => {
    const env = loadEnv(REQUIRED);

    expect(env.PORT).toBe(8000);
    expect(env.API_PREFIX).toBe('/api/v1');
    expect(env.CACHE_TTL_SECONDS).toBe(120);
    expect(env.DEFAULT_NETUID).toBe(18);
    expect(env.WORKERS_IN_PROCESS).toBe(true);
    expect(env.STORAGE_DRIVER).toBe('mongo');
  });

  it('should coerce numbers and booleans from strings', () => {
    const env = loadEnv({ ...REQUIRED, PORT: '9000', WORKERS_IN_PROCESS: '0', TRADE_MAX_AMOUNT: '2.5' });

    expect(env.PORT).toBe(9000);
    expect(env.WORKERS_IN_PROCESS).toBe(false);
    expect(env.TRADE_MAX_AMOUNT).toBe(2.5);
  });

  it('should require the API token', () => {
    expect(() => loadEnv({ DEFAULT_HOTKEY: 'H1' })).toThrow(/API_AUTH_TOKEN/);
  });

  it('should require the task deadline to be shorter than the lock TTL', () => {
    expect(() => loadEnv({ ...REQUIRED, LOCK_TTL_SECONDS: '300', TASK_DEADLINE_SECONDS: '300' }))
      .toThrow('TASK_DEADLINE_SECONDS: must be shorter than LOCK_TTL_SECONDS');
  });

  it('should require the queue lease between the deadline and the lock TTL', () => {
    expect(() => loadEnv({ ...REQUIRED, QUEUE_LEASE_SECONDS: '100' }))
      .toThrow('QUEUE_LEASE_SECONDS: must lie between TASK_DEADLINE_SECONDS and LOCK_TTL_SECONDS');
  });

  it('should accept the shipped example configuration', () => {
    const env = loadEnv(EXAMPLE_ENV);

    expect(env.DEFAULT_HOTKEY).toBe('5DummyHotkeyForDevUseXYZ');
    expect(env.DEFAULT_NETUID).toBe(18);
    expect(env.WORKERS_IN_PROCESS).toBe(true);
  });

  it('should reject a default hotkey outside the base58 alphabet', () => {
    expect(() => loadEnv({ ...REQUIRED, DEFAULT_HOTKEY: '5DefaultHotkeyPlaceholder' }))
      .toThrow('DEFAULT_HOTKEY: hotkey must be a base58 account key');
  });
});
