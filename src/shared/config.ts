/**
 * Configuration for the key server and its client tools.
 *
 * Config file: <configDir>/config.json
 * Client identity: <configDir>/identity/
 *
 * The config directory defaults to .ember-keyserver/ in the current working
 * directory. Override with EMBER_KEYSERVER_DIR.
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

import { createLogger } from './logger.js';

const log = createLogger('config');

export function getConfigDir(): string {
  return process.env.EMBER_KEYSERVER_DIR || path.join(process.cwd(), '.ember-keyserver');
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), 'config.json');
}

export function getIdentityDir(): string {
  return path.join(getConfigDir(), 'identity');
}

const ServerConfigSchema = z.object({
  /** Host to bind to */
  host: z.string().min(1),
  /** Port to listen on */
  port: z.number().int().min(0).max(65535),
  /** SQLite database file, relative to the working directory, or ':memory:' */
  dbPath: z.string().min(1),
  /** Maximum challenge age in ms. 0 disables expiry. */
  challengeTtlMs: z.number().int().nonnegative(),
  /** Hex state key, or "${ENV_VAR}". A random key is generated when unset. */
  stateKey: z.string().optional(),
});
export type ServerConfig = z.infer<typeof ServerConfigSchema>;

const ClientConfigSchema = z.object({
  /** Key server base URL */
  serverUrl: z.string().url(),
  /** Directory holding the client's identity keypair */
  identityDir: z.string().min(1),
  /** Request timeout (ms) */
  requestTimeout: z.number().int().positive(),
});
export type ClientConfig = z.infer<typeof ClientConfigSchema>;

/** Full config file */
export interface Config {
  server: ServerConfig;
  client: ClientConfig;
}

const RawConfigSchema = z.object({
  server: ServerConfigSchema.partial().optional(),
  client: ClientConfigSchema.partial().optional(),
});

export function defaults(): Config {
  return {
    server: {
      host: '127.0.0.1',
      port: 3030,
      dbPath: 'keys.sqlite',
      challengeTtlMs: 5 * 60 * 1000,
    },
    client: {
      serverUrl: 'http://127.0.0.1:3030',
      identityDir: getIdentityDir(),
      requestTimeout: 10_000,
    },
  };
}

function describeIssue(error: z.ZodError, prefix: string[] = []): string {
  const issue = error.issues[0];
  if (!issue) return 'Invalid config';
  const fieldPath = [...prefix, ...issue.path].join('.');
  return fieldPath ? `Invalid config: ${fieldPath}: ${issue.message}` : `Invalid config: ${issue.message}`;
}

/**
 * Merge a parsed config object over the defaults and validate the result.
 *
 * @throws Error naming the first invalid field
 */
export function parseConfig(raw: unknown): Config {
  const partial = RawConfigSchema.safeParse(raw);
  if (!partial.success) {
    throw new Error(describeIssue(partial.error));
  }
  const def = defaults();
  const server = ServerConfigSchema.safeParse({ ...def.server, ...partial.data.server });
  if (!server.success) {
    throw new Error(describeIssue(server.error, ['server']));
  }
  const client = ClientConfigSchema.safeParse({ ...def.client, ...partial.data.client });
  if (!client.success) {
    throw new Error(describeIssue(client.error, ['client']));
  }
  return { server: server.data, client: client.data };
}

export function loadConfig(configPath: string = getConfigPath()): Config {
  if (!fs.existsSync(configPath)) {
    return defaults();
  }
  const raw: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  return parseConfig(raw);
}

export function saveConfig(config: Config, configPath: string = getConfigPath()): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true, mode: 0o700 });
  fs.writeFileSync(configPath, JSON.stringify(config, null, 2), { mode: 0o600 });
}

/**
 * Resolve a config value that may be a literal or a "${VAR_NAME}" reference
 * to an environment variable. Returns undefined if the variable is unset.
 */
export function resolveSecret(value: string): string | undefined {
  const envMatch = /^\$\{(.+)\}$/.exec(value);
  if (!envMatch) return value;
  const envVal = process.env[envMatch[1]];
  if (envVal === undefined) {
    log.warn(`env var ${envMatch[1]} not found`);
  }
  return envVal;
}
