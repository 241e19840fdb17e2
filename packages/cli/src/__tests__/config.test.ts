import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  CONFIG_FILE_NAME,
  CONFIG_TEMPLATE,
  ConfigError,
  loadConfig,
  readConfigFile,
  resolveConfig,
} from '../config.js';

describe('resolveConfig', () => {
  it('fills defaults around the agent name', () => {
    const config = resolveConfig({ flags: { name: 'Anna' } });

    expect(config).toEqual({
      enabled: true,
      agentName: 'Anna',
      host: '127.0.0.1',
      port: 54321,
      discoveryRange: 5,
      connectTimeoutMs: 500,
      maxMessageLength: 5000,
      queueSize: 100,
      logBroadcasts: true,
      logReceives: true,
    });
  });

  it('lets the environment override the file', () => {
    const config = resolveConfig({
      file: { agentName: 'Anna', port: 54322 },
      env: { MURMUR_AGENT: 'Miku', MURMUR_PORT: '54323' },
    });

    expect(config.agentName).toBe('Miku');
    expect(config.port).toBe(54323);
  });

  it('lets flags override the environment', () => {
    const config = resolveConfig({
      env: { MURMUR_AGENT: 'Miku', MURMUR_HOST: '127.0.0.2' },
      flags: { name: 'Rin', port: '54324', range: '3' },
    });

    expect(config.agentName).toBe('Rin');
    expect(config.host).toBe('127.0.0.2');
    expect(config.port).toBe(54324);
    expect(config.discoveryRange).toBe(3);
  });

  it('keeps file values that nothing overrides', () => {
    const config = resolveConfig({
      file: { agentName: 'Anna', queueSize: 7, logReceives: false },
      flags: { port: '54330' },
    });

    expect(config.queueSize).toBe(7);
    expect(config.logReceives).toBe(false);
    expect(config.port).toBe(54330);
  });

  it('ignores empty environment values', () => {
    const config = resolveConfig({
      file: { agentName: 'Anna', port: 54322 },
      env: { MURMUR_PORT: '' },
    });

    expect(config.port).toBe(54322);
  });

  it('rejects a port that is not a number', () => {
    expect(() => resolveConfig({ flags: { name: 'Anna', port: 'abc' } })).toThrow(
      new ConfigError('Invalid --port: abc'),
    );
  });

  it('rejects an out of range environment port', () => {
    expect(() => resolveConfig({ env: { MURMUR_AGENT: 'Anna', MURMUR_PORT: '70000' } })).toThrow(
      'Invalid MURMUR_PORT: 70000',
    );
  });

  it('requires an agent name', () => {
    expect(() => resolveConfig({})).toThrow(ConfigError);
    expect(() => resolveConfig({})).toThrow(/^Invalid configuration: agentName: /);
  });

  it('rejects a file with the wrong shape', () => {
    expect(() => resolveConfig({ file: { agentName: 'Anna', port: 'high' } })).toThrow(
      /^Invalid murmur\.config\.json: port: /,
    );
  });

  it('accepts the init template as it is', () => {
    expect(resolveConfig({ file: CONFIG_TEMPLATE }).agentName).toBe('Anna');
  });
});

describe('config file', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'murmur-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('resolves undefined when there is no file', async () => {
    await expect(readConfigFile(dir)).resolves.toBeUndefined();
  });

  it('reports invalid JSON', async () => {
    await writeFile(join(dir, CONFIG_FILE_NAME), '{ nope', 'utf-8');

    await expect(readConfigFile(dir)).rejects.toThrow(
      `Invalid JSON in ${join(dir, CONFIG_FILE_NAME)}`,
    );
  });

  it('loads the file, then the environment, then flags', async () => {
    await writeFile(
      join(dir, CONFIG_FILE_NAME),
      JSON.stringify({ agentName: 'Anna', port: 54322, discoveryRange: 2 }),
      'utf-8',
    );

    const config = await loadConfig(dir, { port: '54325' }, { MURMUR_HOST: '127.0.0.3' });

    expect(config.agentName).toBe('Anna');
    expect(config.host).toBe('127.0.0.3');
    expect(config.port).toBe(54325);
    expect(config.discoveryRange).toBe(2);
  });
});
