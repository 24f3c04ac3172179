/**
 * Loads `.depdot.yml`.
 *
 * Missing file means defaults; a present file is interpolated
 * (`${VAR}`), validated, and rejected as a whole when invalid.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse as parseYaml } from 'yaml';
import { ConfigError, getErrorMessage } from '@depdot/core';
import { type DepdotConfig, depdotConfigSchema } from './schema.js';

export const CONFIG_FILENAME = '.depdot.yml';

/**
 * Interpolate environment variables in strings.
 * Supports ${VAR_NAME} syntax.
 */
function interpolateEnvVars(value: string): string {
  return value.replace(/\$\{(\w+)\}/g, (_, varName: string) => {
    return process.env[varName] ?? '';
  });
}

function interpolateConfig(value: unknown): unknown {
  if (typeof value === 'string') {
    return interpolateEnvVars(value);
  }
  if (Array.isArray(value)) {
    return value.map(interpolateConfig);
  }
  if (value && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = interpolateConfig(entry);
    }
    return result;
  }
  return value;
}

/**
 * Load config from `configPath`, or from `.depdot.yml` in `rootDir`.
 *
 * @throws {ConfigError} when an explicit path does not exist, or the file
 *   cannot be parsed or fails validation
 */
export function loadConfig(rootDir: string, configPath?: string): DepdotConfig {
  const resolved = configPath
    ? path.resolve(rootDir, configPath)
    : path.join(rootDir, CONFIG_FILENAME);

  if (!fs.existsSync(resolved)) {
    if (configPath) {
      throw new ConfigError(`Config file not found: ${resolved}`, { path: resolved });
    }
    return depdotConfigSchema.parse({});
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(fs.readFileSync(resolved, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Failed to parse ${resolved}: ${getErrorMessage(error)}`, {
      path: resolved,
    });
  }

  if (!parsed || typeof parsed !== 'object') {
    return depdotConfigSchema.parse({});
  }

  const result = depdotConfigSchema.safeParse(interpolateConfig(parsed));
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`Invalid config in ${resolved}:\n${issues}`, { path: resolved });
  }
  return result.data;
}
