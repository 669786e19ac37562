/**
 * @fileoverview Client configuration loading from YAML.
 * Validates the file and applies environment overrides.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ValidationError } from '../errors.js';
import {
  DEFAULT_CLOSE_TIMEOUT_MS,
  DEFAULT_HANDSHAKE_TIMEOUT_MS,
  type MessageHandler,
  MixnetSocketManager,
} from '../MixnetSocketManager.js';
import { createLogger } from '../utils/logger.js';

/** Default WebSocket endpoint of a locally running Nym native client */
export const DEFAULT_CLIENT_URI = 'ws://127.0.0.1:1977';

const ClientConfigSchema = z.object({
  uri: z.string().min(1).default(DEFAULT_CLIENT_URI),
  handshakeTimeoutMs: z.number().int().positive().default(DEFAULT_HANDSHAKE_TIMEOUT_MS),
  closeTimeoutMs: z.number().int().positive().default(DEFAULT_CLOSE_TIMEOUT_MS),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type ClientConfig = z.infer<typeof ClientConfigSchema>;

/**
 * Validate raw configuration data (e.g. parsed YAML) and fill in defaults.
 * An empty document (null/undefined) yields the defaults.
 * @throws {ValidationError} if a field has the wrong type or value
 */
export function parseClientConfig(raw: unknown): ClientConfig {
  const result = ClientConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ValidationError(details, { cause: result.error });
  }
  return result.data;
}

/**
 * Load the client configuration.
 *
 * Config file is loaded from:
 * - the `configPath` argument if given
 * - otherwise the CONFIG_PATH environment variable if set
 * - otherwise ./config/client.yaml relative to cwd
 *
 * A missing file yields the defaults. MIXNET_CLIENT_URI overrides `uri`.
 * @throws {ValidationError} if the file is not valid YAML or fails validation
 */
export function loadClientConfig(configPath?: string): ClientConfig {
  const path =
    // biome-ignore lint/complexity/useLiteralKeys: Required for noPropertyAccessFromIndexSignature
    configPath ?? process.env['CONFIG_PATH'] ?? join(process.cwd(), 'config/client.yaml');

  let raw: unknown = {};
  if (existsSync(path)) {
    try {
      raw = parseYaml(readFileSync(path, 'utf8'));
    } catch (error) {
      throw new ValidationError(`could not parse ${path}`, { cause: error });
    }
  }

  const config = parseClientConfig(raw);

  // biome-ignore lint/complexity/useLiteralKeys: Required for noPropertyAccessFromIndexSignature
  const uriOverride = process.env['MIXNET_CLIENT_URI'];
  if (uriOverride) {
    return { ...config, uri: uriOverride };
  }
  return config;
}

/**
 * Build a socket manager, with a console logger at the configured level,
 * from a loaded configuration.
 */
export function createSocketManagerFromConfig(
  messageHandler: MessageHandler,
  config: ClientConfig = loadClientConfig()
): MixnetSocketManager {
  return new MixnetSocketManager({
    uri: config.uri,
    messageHandler,
    logger: createLogger({ level: config.logLevel }),
    handshakeTimeoutMs: config.handshakeTimeoutMs,
    closeTimeoutMs: config.closeTimeoutMs,
  });
}
