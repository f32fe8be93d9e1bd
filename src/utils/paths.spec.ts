import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { configDir, defaultUndoLogPath, logsDir } from './paths.js';

const ENV_KEYS = [
  'NORMALIZE_FILENAME_HOME',
  'NORMALIZE_FILENAME_STATE',
  'NORMALIZE_FILENAME_LOGS',
  'XDG_CONFIG_HOME',
  'XDG_STATE_HOME'
];
const originalEnv: Record<string, string | undefined> = {};

beforeEach(() => {
  for (const key of ENV_KEYS) {
    originalEnv[key] = process.env[key];
    delete process.env[key];
  }
});

afterEach(() => {
  for (const key of ENV_KEYS) {
    const value = originalEnv[key];
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
});

describe('configDir', () => {
  it('falls back to default app name when input is blank', () => {
    process.env.XDG_CONFIG_HOME = '/tmp/config';
    const result = configDir('   ');
    expect(result).toBe(path.join('/tmp/config', 'normalize-filename'));
  });

  it('trims surrounding whitespace from custom app names', () => {
    process.env.XDG_CONFIG_HOME = '/tmp/config';
    const result = configDir('  demo-app  ');
    expect(result).toBe(path.join('/tmp/config', 'demo-app'));
  });

  it('prefers the explicit override', () => {
    process.env.XDG_CONFIG_HOME = '/tmp/config';
    process.env.NORMALIZE_FILENAME_HOME = '/tmp/override';
    expect(configDir()).toBe('/tmp/override');
  });
});

describe('state locations', () => {
  it('puts the undo script in the state directory', () => {
    process.env.XDG_STATE_HOME = '/tmp/state';
    expect(defaultUndoLogPath()).toBe(path.join('/tmp/state', 'normalize-filename', 'undo.sh'));
  });

  it('nests logs under the state directory', () => {
    process.env.XDG_STATE_HOME = '/tmp/state';
    expect(logsDir()).toBe(path.join('/tmp/state', 'normalize-filename', 'logs'));
  });
});
