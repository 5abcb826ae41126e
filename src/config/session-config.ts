/**
 * Session configuration.
 *
 * Priority (highest first):
 * 1. Environment (TOPICWIRE_* variables)
 * 2. Config file (.yaml/.yml or .json)
 * 3. Defaults
 */

import fs from 'node:fs';
import path from 'node:path';

import YAML from 'yaml';
import { z } from 'zod';

import { DEFAULT_SESSION_OPTIONS } from '../session/transport-session.js';
import { ConfigError, toErrorMessage } from '../utils/errors.js';
import { LOG_LEVELS } from '../utils/logger.js';

const positiveInt = z.coerce.number().int().positive();

export const sessionConfigSchema = z.object({
  url: z.string().min(1).optional(),
  topics: z.array(z.string().min(1)).default([]),
  reconnectDelayMs: positiveInt.default(DEFAULT_SESSION_OPTIONS.reconnectDelayMs),
  closeTimeoutMs: positiveInt.default(DEFAULT_SESSION_OPTIONS.closeTimeoutMs),
  connectTimeoutMs: positiveInt.default(DEFAULT_SESSION_OPTIONS.connectTimeoutMs),
  logLevel: z.enum(LOG_LEVELS).default('info'),
});

export type SessionConfig = z.infer<typeof sessionConfigSchema>;

export interface LoadConfigOptions {
  /** Path to a YAML or JSON config file */
  filePath?: string;
  env?: NodeJS.ProcessEnv;
  readFile?: (filePath: string) => string;
}

const ENV_KEYS = {
  url: 'TOPICWIRE_URL',
  topics: 'TOPICWIRE_TOPICS',
  reconnectDelayMs: 'TOPICWIRE_RECONNECT_DELAY_MS',
  closeTimeoutMs: 'TOPICWIRE_CLOSE_TIMEOUT_MS',
  connectTimeoutMs: 'TOPICWIRE_CONNECT_TIMEOUT_MS',
  logLevel: 'TOPICWIRE_LOG_LEVEL',
} as const;

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

/** Split a comma-separated topic list, dropping blanks. */
export function parseTopicList(value: string): string[] {
  return value
    .split(',')
    .map((topic) => topic.trim())
    .filter((topic) => topic.length > 0);
}

function readConfigFile(filePath: string, readFile: (filePath: string) => string): Record<string, unknown> {
  let contents: string;
  try {
    contents = readFile(filePath);
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${filePath}: ${toErrorMessage(err)}`, err);
  }

  let parsed: unknown;
  try {
    parsed = path.extname(filePath).toLowerCase() === '.json' ? JSON.parse(contents) : YAML.parse(contents);
  } catch (err) {
    throw new ConfigError(`Cannot parse config file ${filePath}: ${toErrorMessage(err)}`, err);
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isObject(parsed)) {
    throw new ConfigError(`Config file ${filePath} must contain a mapping`);
  }
  return parsed;
}

function readEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  for (const [key, envName] of Object.entries(ENV_KEYS)) {
    const raw = env[envName];
    if (raw === undefined || raw.trim() === '') continue;
    values[key] = key === 'topics' ? parseTopicList(raw) : raw.trim();
  }
  return values;
}

/**
 * Load and validate the session configuration.
 * @throws ConfigError when the file cannot be read or a value is invalid
 */
export function loadSessionConfig(options: LoadConfigOptions = {}): SessionConfig {
  const env = options.env ?? process.env;
  const readFile = options.readFile ?? ((filePath: string) => fs.readFileSync(filePath, 'utf-8'));

  const fromFile = options.filePath ? readConfigFile(options.filePath, readFile) : {};
  const merged = { ...fromFile, ...readEnv(env) };

  const result = sessionConfigSchema.safeParse(merged);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`, result.error);
  }
  return result.data;
}
