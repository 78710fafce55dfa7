// Config loader with precedence chain: overrides > env > file > defaults

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { PushBridgeConfigSchema } from '../types/index.js';
import type { PushBridgeConfig, PushBridgeConfigInput } from '../types/index.js';

export const CONFIG_FILENAME = '.push-bridge.json';
export const ENV_PREFIX = 'PUSH_BRIDGE_';

/**
 * Convert UPPER_SNAKE_CASE key (after prefix strip) to camelCase.
 * Example: SERVER_HOST -> serverHost, REQUEST_TIMEOUT_MS -> requestTimeoutMs
 */
function snakeToCamel(key: string): string {
  return key
    .toLowerCase()
    .replace(/_([a-z])/g, (_, letter: string) => letter.toUpperCase());
}

/**
 * Coerce string values to appropriate JS types.
 * - "true"/"false" -> boolean
 * - numeric strings -> number
 * - everything else -> string
 *
 * Keys that are always strings (ids, tokens) skip coercion so a numeric
 * sender id stays a string.
 */
const STRING_KEYS = new Set(['senderId', 'nativeToken', 'serverHost']);

function coerceValue(key: string, value: string): unknown {
  if (STRING_KEYS.has(key)) return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (/^\d+$/.test(value)) return parseInt(value, 10);
  return value;
}

/**
 * Extract PUSH_BRIDGE_* environment variables, strip prefix,
 * convert to camelCase, and coerce types.
 */
function loadEnvVars(): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (key.startsWith(ENV_PREFIX) && value !== undefined) {
      const camelKey = snakeToCamel(key.slice(ENV_PREFIX.length));
      result[camelKey] = coerceValue(camelKey, value);
    }
  }
  return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read and parse the config file from projectDir.
 * Returns an empty object when the file does not exist.
 */
async function loadConfigFile(
  projectDir: string,
): Promise<Record<string, unknown>> {
  const configPath = join(projectDir, CONFIG_FILENAME);
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err: unknown) {
    if (
      err instanceof Error &&
      'code' in err &&
      err.code === 'ENOENT'
    ) {
      return {};
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new Error(
      `Invalid config file at ${configPath}: file contains malformed JSON`,
    );
  }
  if (!isPlainObject(parsed)) {
    throw new Error(`Invalid config file at ${configPath}: expected a JSON object`);
  }
  return parsed;
}

/**
 * Validate a config object that did not come from loadConfig
 * (e.g. one built in code by the embedding application).
 */
export function parseConfig(input: PushBridgeConfigInput | Record<string, unknown>): PushBridgeConfig {
  const result = PushBridgeConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Config validation failed:\n${issues}`);
  }
  return result.data;
}

/**
 * Load configuration with precedence: overrides > env vars > config file > Zod defaults.
 *
 * @param projectDir - Directory containing .push-bridge.json
 * @param overrides - Values supplied in code by the embedding application
 */
export async function loadConfig(
  projectDir: string,
  overrides: Partial<PushBridgeConfigInput> = {},
): Promise<PushBridgeConfig> {
  const fileConfig = await loadConfigFile(projectDir);
  const envConfig = loadEnvVars();
  return parseConfig({ ...fileConfig, ...envConfig, ...overrides });
}
