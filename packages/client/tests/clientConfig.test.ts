import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  createSocketManagerFromConfig,
  DEFAULT_CLIENT_URI,
  loadClientConfig,
  parseClientConfig,
  ValidationError,
} from '../src/index.js';

const ENV_KEYS = ['CONFIG_PATH', 'MIXNET_CLIENT_URI'] as const;

describe('parseClientConfig', () => {
  it('should fill in defaults for an empty document', () => {
    expect(parseClientConfig(null)).toEqual({
      uri: DEFAULT_CLIENT_URI,
      handshakeTimeoutMs: 5000,
      closeTimeoutMs: 5000,
      logLevel: 'info',
    });
  });

  it('should keep configured values', () => {
    expect(
      parseClientConfig({ uri: 'ws://10.0.0.2:1977', handshakeTimeoutMs: 250, logLevel: 'debug' })
    ).toEqual({
      uri: 'ws://10.0.0.2:1977',
      handshakeTimeoutMs: 250,
      closeTimeoutMs: 5000,
      logLevel: 'debug',
    });
  });

  it('should name the offending field', () => {
    expect(() => parseClientConfig({ closeTimeoutMs: -1 })).toThrow(ValidationError);
    expect(() => parseClientConfig({ closeTimeoutMs: -1 })).toThrow(
      'Invalid configuration: closeTimeoutMs: Number must be greater than 0'
    );
  });

  it('should reject unknown log levels', () => {
    expect(() => parseClientConfig({ logLevel: 'verbose' })).toThrow(/^Invalid configuration: logLevel:/);
  });
});

describe('loadClientConfig', () => {
  let dir: string;
  const savedEnv: Partial<Record<(typeof ENV_KEYS)[number], string>> = {};

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'mixnet-config-'));
    for (const key of ENV_KEYS) {
      const value = process.env[key];
      if (value !== undefined) {
        savedEnv[key] = value;
      }
      delete process.env[key];
    }
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    for (const key of ENV_KEYS) {
      const value = savedEnv[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
      delete savedEnv[key];
    }
  });

  it('should read the given file', () => {
    const path = join(dir, 'client.yaml');
    writeFileSync(path, 'uri: ws://127.0.0.1:2000\ncloseTimeoutMs: 100\n');

    expect(loadClientConfig(path)).toEqual({
      uri: 'ws://127.0.0.1:2000',
      handshakeTimeoutMs: 5000,
      closeTimeoutMs: 100,
      logLevel: 'info',
    });
  });

  it('should fall back to CONFIG_PATH', () => {
    const path = join(dir, 'from-env.yaml');
    writeFileSync(path, 'logLevel: warn\n');
    process.env['CONFIG_PATH'] = path;

    expect(loadClientConfig().logLevel).toBe('warn');
  });

  it('should use the defaults when the file does not exist', () => {
    expect(loadClientConfig(join(dir, 'missing.yaml'))).toEqual(parseClientConfig({}));
  });

  it('should let MIXNET_CLIENT_URI override the file', () => {
    const path = join(dir, 'client.yaml');
    writeFileSync(path, 'uri: ws://127.0.0.1:2000\n');
    process.env['MIXNET_CLIENT_URI'] = 'ws://127.0.0.1:3000';

    expect(loadClientConfig(path).uri).toBe('ws://127.0.0.1:3000');
  });

  it('should reject malformed YAML', () => {
    const path = join(dir, 'broken.yaml');
    writeFileSync(path, 'uri: [unterminated\n');

    expect(() => loadClientConfig(path)).toThrow(`Invalid configuration: could not parse ${path}`);
  });

  it('should reject invalid values', () => {
    const path = join(dir, 'client.yaml');
    writeFileSync(path, 'handshakeTimeoutMs: soon\n');

    expect(() => loadClientConfig(path)).toThrow(ValidationError);
  });
});

describe('createSocketManagerFromConfig', () => {
  it('should build an idle manager', () => {
    const manager = createSocketManagerFromConfig(() => undefined, parseClientConfig({}));

    expect(manager.isRunning()).toBe(false);
    expect(manager.state).toBe('idle');
  });
});
