/**
 * Advisory host checks run before starting the web UI.
 *
 * Each check returns a structured result with a status, a detail message
 * and, on warning, a fix suggestion. None of them block `run`: they only
 * explain the usual reasons the web UI shows no models.
 *
 * All external I/O is injected via {@link ExecFn} for testability.
 */

import type { ExecFn } from './container/runtime.js';
import { OLLAMA_PORT } from './host-url.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Result of a single host check. */
export interface HostCheckResult {
  /** Machine-readable check identifier. */
  name: string;
  /** Human-readable check label for display. */
  label: string;
  status: 'pass' | 'warn';
  detail: string;
  /** Actionable fix suggestion (only present on warning). */
  fix?: string;
}

/** Injectable dependencies for {@link runHostChecks}. */
export interface HostCheckDeps {
  exec: ExecFn;
  ollamaUrl: string;
  ollamaPort?: number;
}

// ---------------------------------------------------------------------------
// Individual checks
// ---------------------------------------------------------------------------

/**
 * Warn when Ollama listens on loopback only, which makes it unreachable
 * from inside the container VM. Passes when `lsof` is missing or finds no
 * listener, since neither says anything about the binding.
 */
export async function checkOllamaBinding(
  exec: ExecFn,
  port = OLLAMA_PORT,
): Promise<HostCheckResult> {
  let stdout: string;
  try {
    ({ stdout } = await exec('lsof', [`-iTCP:${port}`, '-sTCP:LISTEN', '-nP']));
  } catch {
    return {
      name: 'ollama-binding',
      label: 'Ollama binding',
      status: 'pass',
      detail: 'Not checked (lsof unavailable or no listener)',
    };
  }

  if (stdout.includes(`127.0.0.1:${port}`)) {
    return {
      name: 'ollama-binding',
      label: 'Ollama binding',
      status: 'warn',
      detail: 'Ollama is listening on 127.0.0.1 only',
      fix: "Enable 'Expose Ollama to the network' in the Ollama app settings, or run: OLLAMA_HOST=0.0.0.0 ollama serve",
    };
  }

  return {
    name: 'ollama-binding',
    label: 'Ollama binding',
    status: 'pass',
    detail: 'Listening beyond loopback',
  };
}

const LOOPBACK_HOSTS: ReadonlySet<string> = new Set(['127.0.0.1', 'localhost', '[::1]']);

/** Warn about URL shapes that commonly fail from inside the container. */
export function checkOllamaUrl(url: string): HostCheckResult {
  let hostname: string;
  try {
    hostname = new URL(url).hostname;
  } catch {
    return {
      name: 'ollama-url',
      label: 'Ollama URL',
      status: 'warn',
      detail: `Not a valid URL: ${url}`,
      fix: 'Set OLLAMA_URL to http://<LAN IP>:11434',
    };
  }

  if (hostname.endsWith('.local')) {
    return {
      name: 'ollama-url',
      label: 'Ollama URL',
      status: 'warn',
      detail: `Using mDNS hostname (${url}); some containers cannot resolve .local`,
      fix: 'If models do not appear, re-run with: OLLAMA_URL="http://$(ipconfig getifaddr en0):11434" webui-launch run',
    };
  }

  if (LOOPBACK_HOSTS.has(hostname)) {
    return {
      name: 'ollama-url',
      label: 'Ollama URL',
      status: 'warn',
      detail: `${hostname} is not reachable from inside the container`,
      fix: 'Make Ollama listen on 0.0.0.0 and use your LAN IP',
    };
  }

  return {
    name: 'ollama-url',
    label: 'Ollama URL',
    status: 'pass',
    detail: url,
  };
}

// ---------------------------------------------------------------------------
// Runner
// ---------------------------------------------------------------------------

/** Run all host checks and return results in display order. */
export async function runHostChecks(deps: HostCheckDeps): Promise<HostCheckResult[]> {
  return [
    await checkOllamaBinding(deps.exec, deps.ollamaPort),
    checkOllamaUrl(deps.ollamaUrl),
  ];
}
