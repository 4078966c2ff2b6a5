/**
 * webui-launch configuration schema, defaults and environment overrides.
 *
 * Precedence, lowest first: {@link DEFAULT_CONFIG}, `config.toml` in
 * `$WEBUI_LAUNCH_HOME`, then `OLLAMA_URL`, `OWUI_*` and `LOG_LEVEL`.
 */

import _Ajv from 'ajv';
// ajv ESM interop: default export is the constructor
const Ajv = _Ajv.default ?? _Ajv;

import { join } from 'node:path';
import { homedir } from 'node:os';
import { ConfigurationError } from '../core/readiness/errors.js';
import type { PortMapping } from '../core/container/runtime.js';
import { isLogLevel, type LogLevel } from '../core/logger.js';
import { CONFIG_JSON_SCHEMA } from './config-schema.js';

// ---------------------------------------------------------------------------
// Config section types
// ---------------------------------------------------------------------------

/** `[container]` section of config.toml. */
export interface ContainerConfig {
  name: string;
  image: string;
  ports: PortMapping;
  /** Host directory mounted at {@link CONTAINER_DATA_DIR}; may start with `~`. */
  data_dir: string;
}

/** `[ollama]` section of config.toml. */
export interface OllamaConfig {
  /** Explicit Ollama URL; discovered from the host's addresses when absent. */
  url?: string;
}

/** `[readiness]` section of config.toml. */
export interface ReadinessConfig {
  timeout_seconds: number;
  poll_interval_seconds: number;
  /** Expected body substring; empty disables the content check. */
  signature: string;
}

/** `[logging]` section of config.toml. */
export interface LoggingConfig {
  level: LogLevel;
}

export interface LauncherConfig {
  container: ContainerConfig;
  ollama: OllamaConfig;
  readiness: ReadinessConfig;
  logging: LoggingConfig;
}

/** Shape of a parsed config.toml before defaults are applied. */
export interface RawConfigFile {
  container?: { name?: string; image?: string; ports?: string; data_dir?: string };
  ollama?: { url?: string };
  readiness?: { timeout_seconds?: number; poll_interval_seconds?: number; signature?: string };
  logging?: { level?: LogLevel };
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

/** Where the web UI keeps its database inside the container. */
export const CONTAINER_DATA_DIR = '/app/backend/data';

export const DEFAULT_CONFIG: LauncherConfig = {
  container: {
    name: 'open-webui',
    image: 'ghcr.io/open-webui/open-webui:main',
    ports: { hostPort: 3000, containerPort: 8080 },
    data_dir: '~/.open-webui',
  },
  ollama: {},
  readiness: {
    timeout_seconds: 120,
    poll_interval_seconds: 1,
    signature: 'open webui',
  },
  logging: { level: 'warn' },
};

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

/** Expand a leading `~` to the user's home directory. */
export function expandHome(path: string, userHome: string = homedir()): string {
  if (path === '~') return userHome;
  if (path.startsWith('~/')) return join(userHome, path.slice(2));
  return path;
}

/**
 * Resolve the webui-launch home directory (where `config.toml` lives).
 *
 * `$WEBUI_LAUNCH_HOME` when non-empty (with `~` expanded and any trailing
 * slash stripped), otherwise `~/.webui-launch`.
 */
export function resolveHome(
  env: NodeJS.ProcessEnv = process.env,
  userHome: string = homedir(),
): string {
  const envValue = env['WEBUI_LAUNCH_HOME'];
  if (envValue && envValue.length > 0) {
    let resolved = expandHome(envValue, userHome);
    if (resolved.length > 1 && resolved.endsWith('/')) {
      resolved = resolved.slice(0, -1);
    }
    return resolved;
  }
  return join(userHome, '.webui-launch');
}

// ---------------------------------------------------------------------------
// Field parsers
// ---------------------------------------------------------------------------

function parsePort(value: string, spec: string, field: string): number {
  const port = /^\d+$/.test(value) ? Number(value) : NaN;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigurationError(`Invalid port in "${spec}"`, field);
  }
  return port;
}

/**
 * Parse a `--publish` style spec: `host:container` or
 * `address:host:container`.
 */
export function parsePortMapping(spec: string, field = 'container.ports'): PortMapping {
  const parts = spec.split(':');
  if (parts.length === 2) {
    const [host = '', container = ''] = parts;
    return {
      hostPort: parsePort(host, spec, field),
      containerPort: parsePort(container, spec, field),
    };
  }
  if (parts.length === 3) {
    const [address = '', host = '', container = ''] = parts;
    if (address === '') {
      throw new ConfigurationError(`Invalid bind address in "${spec}"`, field);
    }
    return {
      hostAddress: address,
      hostPort: parsePort(host, spec, field),
      containerPort: parsePort(container, spec, field),
    };
  }
  throw new ConfigurationError(
    `Expected "hostPort:containerPort" or "address:hostPort:containerPort", got "${spec}"`,
    field,
  );
}

/** Validate an http(s) URL and return it without a trailing slash. */
export function parseHttpUrl(value: string, field: string): string {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new ConfigurationError(`Invalid URL: "${value}"`, field);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ConfigurationError(`URL must use http or https: "${value}"`, field);
  }
  return value.replace(/\/+$/, '');
}

function parseSeconds(value: string, field: string): number {
  const seconds = Number(value);
  if (value.trim() === '' || !Number.isFinite(seconds) || seconds <= 0) {
    throw new ConfigurationError(`${field} must be a positive number of seconds, got "${value}"`, field);
  }
  return seconds;
}

// ---------------------------------------------------------------------------
// parseConfig()
// ---------------------------------------------------------------------------

const ajv = new Ajv({ allErrors: true, strict: false });
const validateRawConfig = ajv.compile<RawConfigFile>(CONFIG_JSON_SCHEMA);

/**
 * Validate a raw config object (e.g. from TOML parsing) and apply defaults.
 *
 * @throws ConfigurationError listing every schema violation.
 */
export function parseConfig(raw: unknown): LauncherConfig {
  if (!validateRawConfig(raw)) {
    const errors = (validateRawConfig.errors ?? []).map((err) => {
      const path = err.instancePath || '/';
      if (err.keyword === 'additionalProperties') {
        const extra = String(err.params['additionalProperty'] ?? '');
        return `${path}: unknown key "${extra}"`;
      }
      return `${path}: ${err.message ?? 'invalid value'}`;
    });
    throw new ConfigurationError(`Invalid config.toml: ${errors.join('; ')}`);
  }

  const container = raw.container ?? {};
  const readiness = raw.readiness ?? {};
  const config: LauncherConfig = {
    container: {
      name: container.name ?? DEFAULT_CONFIG.container.name,
      image: container.image ?? DEFAULT_CONFIG.container.image,
      ports:
        container.ports !== undefined
          ? parsePortMapping(container.ports)
          : { ...DEFAULT_CONFIG.container.ports },
      data_dir: container.data_dir ?? DEFAULT_CONFIG.container.data_dir,
    },
    ollama: {},
    readiness: {
      timeout_seconds: readiness.timeout_seconds ?? DEFAULT_CONFIG.readiness.timeout_seconds,
      poll_interval_seconds:
        readiness.poll_interval_seconds ?? DEFAULT_CONFIG.readiness.poll_interval_seconds,
      signature: readiness.signature ?? DEFAULT_CONFIG.readiness.signature,
    },
    logging: { level: raw.logging?.level ?? DEFAULT_CONFIG.logging.level },
  };

  if (raw.ollama?.url !== undefined) {
    config.ollama.url = parseHttpUrl(raw.ollama.url, 'ollama.url');
  }

  return config;
}

// ---------------------------------------------------------------------------
// applyEnvOverrides()
// ---------------------------------------------------------------------------

/**
 * Apply environment overrides on top of a config.
 *
 * Empty variables count as unset, except `OWUI_READY_SIGNATURE`, where an
 * empty value disables the content check.
 */
export function applyEnvOverrides(
  config: LauncherConfig,
  env: NodeJS.ProcessEnv = process.env,
): LauncherConfig {
  const get = (key: string): string | undefined => {
    const value = env[key];
    return value !== undefined && value !== '' ? value : undefined;
  };

  const result: LauncherConfig = {
    container: { ...config.container, ports: { ...config.container.ports } },
    ollama: { ...config.ollama },
    readiness: { ...config.readiness },
    logging: { ...config.logging },
  };

  const ollamaUrl = get('OLLAMA_URL');
  if (ollamaUrl !== undefined) result.ollama.url = parseHttpUrl(ollamaUrl, 'OLLAMA_URL');

  const name = get('OWUI_NAME');
  if (name !== undefined) result.container.name = name;

  const ports = get('OWUI_PORTS');
  if (ports !== undefined) result.container.ports = parsePortMapping(ports, 'OWUI_PORTS');

  const dataDir = get('OWUI_DATA');
  if (dataDir !== undefined) result.container.data_dir = dataDir;

  const image = get('OWUI_IMAGE');
  if (image !== undefined) result.container.image = image;

  const timeout = get('OWUI_READY_TIMEOUT');
  if (timeout !== undefined) {
    result.readiness.timeout_seconds = parseSeconds(timeout, 'OWUI_READY_TIMEOUT');
  }

  const interval = get('OWUI_POLL_INTERVAL');
  if (interval !== undefined) {
    result.readiness.poll_interval_seconds = parseSeconds(interval, 'OWUI_POLL_INTERVAL');
  }

  const signature = env['OWUI_READY_SIGNATURE'];
  if (signature !== undefined) result.readiness.signature = signature;

  const level = get('LOG_LEVEL');
  if (level !== undefined) {
    if (!isLogLevel(level)) {
      throw new ConfigurationError(
        `LOG_LEVEL must be one of debug, info, warn, error; got "${level}"`,
        'LOG_LEVEL',
      );
    }
    result.logging.level = level;
  }

  return result;
}
