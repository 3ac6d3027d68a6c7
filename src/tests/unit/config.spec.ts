import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import { applyEnvOverrides, expandEnv, loadConfiguration, parseConfiguration } from '../../config.js';
import { ConfigError } from '../../errors.js';

let dir: string;

beforeAll(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'toolgate-config-'));
});

afterAll(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

const writeConfig = (name: string, content: string): string => {
  const file = path.join(dir, name);
  fs.writeFileSync(file, content);
  return file;
};

describe('parseConfiguration', () => {
  it('applies defaults to an empty object', () => {
    const config = parseConfiguration({});
    expect(config.server).toEqual({ port: 8787, concurrency: 10, bearerKeys: [], pingIntervalMs: 15000 });
    expect(config.database).toEqual({ backend: 'memory', path: './toolgate.sqlite' });
    expect(config.mcpConfigPath).toBe('./mcp.json');
    expect(config.model.provider).toBe('test-llm');
    expect(config.streams).toEqual({ capacity: 1000, graceMs: 5000, unclaimedTtlMs: 600000 });
    expect(config.logging).toEqual({ format: 'logfmt', verbose: false, color: false });
  });

  it('names the offending field', () => {
    expect(() => parseConfiguration({ server: { port: 70000 } })).toThrow(/server\.port/);
  });
});

describe('applyEnvOverrides', () => {
  it('coerces integers, lists and booleans', () => {
    const out = applyEnvOverrides({}, {
      TOOLGATE_PORT: '9000',
      TOOLGATE_BEARER_KEYS: 'key-a, key-b,',
      TOOLGATE_VERBOSE: 'yes',
    });
    expect(out).toEqual({ server: { port: 9000, bearerKeys: ['key-a', 'key-b'] }, logging: { verbose: true } });
  });

  it('rejects a non-numeric integer', () => {
    expect(() => applyEnvOverrides({}, { TOOLGATE_PORT: 'eighty' })).toThrow("TOOLGATE_PORT must be an integer, got 'eighty'");
  });

  it('does not mutate nested objects of the input', () => {
    const base = { server: { port: 1 } };
    applyEnvOverrides(base, { TOOLGATE_PORT: '2' });
    expect(base.server.port).toBe(1);
  });
});

describe('expandEnv', () => {
  it('replaces unknown variables with an empty string', () => {
    expect(expandEnv('${A}/${B}', { A: 'x' })).toBe('x/');
  });
});

describe('loadConfiguration', () => {
  it('expands variables in the file and lets the environment win', () => {
    const file = writeConfig('app.json', JSON.stringify({
      server: { port: 8000 },
      database: { backend: 'sqlite', path: '${DATA_DIR}/conversations.sqlite' },
    }));
    const config = loadConfiguration(file, { DATA_DIR: '/var/lib/toolgate', TOOLGATE_PORT: '9100' });
    expect(config.server.port).toBe(9100);
    expect(config.database).toEqual({ backend: 'sqlite', path: '/var/lib/toolgate/conversations.sqlite' });
  });

  it('selects the backend from the environment', () => {
    const file = writeConfig('empty.json', '{}');
    expect(loadConfiguration(file, { TOOLGATE_DATABASE_BACKEND: 'sqlite' }).database.backend).toBe('sqlite');
  });

  it('fails on a missing explicit file', () => {
    expect(() => loadConfiguration(path.join(dir, 'absent.json'), {})).toThrow(ConfigError);
  });

  it('fails on invalid JSON', () => {
    const file = writeConfig('broken.json', '{ server: ');
    expect(() => loadConfiguration(file, {})).toThrow(/Invalid JSON in configuration file/);
  });

  it('fails on a JSON array', () => {
    const file = writeConfig('array.json', '[]');
    expect(() => loadConfiguration(file, {})).toThrow('must contain a JSON object');
  });
});
