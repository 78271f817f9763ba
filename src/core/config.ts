/**
 * Configuration types for md2wiki
 *
 * The Markdown engine itself is not configurable; the config file only
 * controls what happens around it (math embedding, output).
 */

import { readFileSync, existsSync } from 'fs';
import { ConfigError } from './errors';
import { DEFAULT_MATH_OPTIONS, validateMathOptions, type MathRenderOptions } from './math/types';

export interface Md2WikiConfig {
  math: MathRenderOptions & {
    // Replace math fragments with embedded images after conversion
    embed: boolean;
  };

  // File extension of the output written next to the input
  outputExtension: string;
}

export const DEFAULT_CONFIG: Md2WikiConfig = {
  math: {
    ...DEFAULT_MATH_OPTIONS,
    embed: false, // Leave math to the wiki's own renderer by default
  },
  outputExtension: 'html',
};

export const DEFAULT_CONFIG_PATHS = ['md2wiki.config.json', '.md2wiki.json', 'md2wiki.json'];

export type DeepPartial<T> = { [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K] };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects
 */
function deepMerge<T extends object>(target: T, source: DeepPartial<T>): T {
  const result = { ...target };

  for (const key in source) {
    if (Object.prototype.hasOwnProperty.call(source, key)) {
      const sourceValue: unknown = source[key];
      const targetValue: unknown = result[key];

      if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
        // Recursively merge nested objects
        const merged: unknown = deepMerge<Record<string, unknown>>(targetValue, sourceValue);
        result[key] = merged as T[Extract<keyof T, string>];
      } else if (sourceValue !== undefined) {
        result[key] = sourceValue as T[Extract<keyof T, string>];
      }
    }
  }

  return result;
}

/**
 * Check a merged config, throwing ConfigError on invalid values
 */
export function validateConfig(config: Md2WikiConfig): Md2WikiConfig {
  if (!isPlainObject(config.math)) {
    throw new ConfigError('math must be an object');
  }
  try {
    validateMathOptions(config.math);
  } catch (e) {
    throw new ConfigError(e instanceof Error ? e.message : String(e));
  }
  if (typeof config.math.embed !== 'boolean') {
    throw new ConfigError('math.embed must be true or false');
  }
  if (typeof config.outputExtension !== 'string' || !/^[\w.-]+$/.test(config.outputExtension)) {
    throw new ConfigError(`Invalid outputExtension: ${String(config.outputExtension)}`);
  }
  return config;
}

/**
 * Merge partial settings (from a file or the command line) over a config
 *
 * @throws ConfigError if the result is invalid
 */
export function mergeConfig(
  base: Md2WikiConfig,
  overrides: DeepPartial<Md2WikiConfig>,
): Md2WikiConfig {
  return validateConfig(deepMerge(base, overrides));
}

/**
 * Load config from file, merging with defaults
 *
 * A file that cannot be read or parsed is reported and ignored; a file with
 * out-of-range values throws ConfigError.
 */
export function loadConfig(configPath?: string): Md2WikiConfig {
  let configFile: string | undefined;

  if (configPath) {
    configFile = configPath;
  } else {
    // Try default paths
    configFile = DEFAULT_CONFIG_PATHS.find((path) => existsSync(path));
  }

  if (!configFile || !existsSync(configFile)) {
    return structuredClone(DEFAULT_CONFIG);
  }

  let parsed: DeepPartial<Md2WikiConfig>;
  try {
    parsed = JSON.parse(readFileSync(configFile, 'utf-8'));
  } catch (e) {
    console.warn(`Warning: Failed to load config from ${configFile}:`, e);
    return structuredClone(DEFAULT_CONFIG);
  }

  if (!isPlainObject(parsed)) {
    console.warn(`Warning: Ignoring config in ${configFile}: expected a JSON object`);
    return structuredClone(DEFAULT_CONFIG);
  }

  return mergeConfig(DEFAULT_CONFIG, parsed);
}
