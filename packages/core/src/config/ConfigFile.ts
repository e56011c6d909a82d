// src/config/ConfigFile.ts

import type { Dispatcher } from '../core/Dispatcher.js';
import { ConfigError } from '../core/errors.js';
import { PathInput } from '../core/types.js';

export const DEFAULT_CONFIG_PATH = '~/.pathbridge.json';

export type ConfigValues = Record<string, unknown>;

/**
 * Load a JSON configuration object from a local or s3 path.
 * With no path, falls back to ~/.pathbridge.json.
 * Throws ConfigError when the file is missing, is not a JSON object, or
 * lacks any of the `required` keys.
 */
export async function parseConfig(
  dispatcher: Dispatcher,
  path?: PathInput,
  required: readonly string[] = []
): Promise<ConfigValues> {
  const location = path ?? DEFAULT_CONFIG_PATH;

  if (!(await dispatcher.exists(location))) {
    throw new ConfigError(
      path === undefined
        ? `No path was specified and the default '${DEFAULT_CONFIG_PATH}' does not exist`
        : `'${String(location)}' does not exist`,
      String(location)
    );
  }

  const text = (await dispatcher.readBytes(location)).toString('utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigError(`Failed to parse config file: ${error.message}`, String(location));
    }
    throw error;
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError('Config file must contain a JSON object', String(location));
  }

  const config: ConfigValues = Object.fromEntries(Object.entries(parsed));
  const missing = required.filter((key) => !(key in config));
  if (missing.length > 0) {
    throw new ConfigError(`Missing required configuration key(s): ${missing.join(', ')}`, String(location));
  }
  return config;
}
