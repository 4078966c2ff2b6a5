/**
 * TOML-based configuration loader for webui-launch.
 *
 * Reads `config.toml` from the webui-launch home, parses it with smol-toml,
 * validates it against the config schema, then layers environment
 * overrides on top.
 */

import { parse as parseTOML } from 'smol-toml';
import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { applyEnvOverrides, parseConfig } from '../types/config.js';
import type { LauncherConfig } from '../types/config.js';
import { ConfigurationError } from './readiness/errors.js';

/** Path of the config file inside a webui-launch home. */
export function configPath(home: string): string {
  return join(home, 'config.toml');
}

/**
 * Load `config.toml` from a webui-launch home directory.
 *
 * If the file does not exist or is empty, returns the defaults.
 *
 * @throws ConfigurationError on invalid TOML syntax or schema violations.
 */
export function loadConfigFile(home: string): LauncherConfig {
  const path = configPath(home);

  if (!existsSync(path)) {
    return parseConfig({});
  }

  const content = readFileSync(path, 'utf-8');
  if (content.trim().length === 0) {
    return parseConfig({});
  }

  let raw: unknown;
  try {
    raw = parseTOML(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message.split('\n')[0] : String(err);
    throw new ConfigurationError(`Invalid TOML in ${path}: ${reason}`);
  }
  return parseConfig(raw);
}

/**
 * Load the effective configuration: defaults, then `config.toml`, then
 * environment overrides.
 */
export function loadConfig(
  home: string,
  env: NodeJS.ProcessEnv = process.env,
): LauncherConfig {
  return applyEnvOverrides(loadConfigFile(home), env);
}
