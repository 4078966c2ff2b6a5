/**
 * `webui-launch run` and `webui-launch wait`.
 *
 * `run` replaces any existing container of the configured name with a
 * fresh one wired to the host's Ollama, then waits for the web UI to
 * answer. A readiness timeout after `run` is advisory (the container was
 * started, it may just be slow); the same timeout fails `wait`.
 */

import type { ContainerRuntime, ExecFn, PortMapping } from './core/container/runtime.js';
import { runHostChecks } from './core/host-checks.js';
import { pickHostUrl } from './core/host-url.js';
import { createLogger } from './core/logger.js';
import {
  isConfigurationError,
  isReadinessTimeoutError,
  type ReadinessOptions,
  type ReadyResult,
} from './core/readiness/index.js';
import { CONTAINER_DATA_DIR, expandHome, type LauncherConfig } from './types/config.js';

const logger = createLogger('run');

// ---------------------------------------------------------------------------
// Dependencies
// ---------------------------------------------------------------------------

/** Injectable dependencies for `run` and `wait`. */
export interface RunDeps {
  stdout: (msg: string) => void;
  stderr: (msg: string) => void;
  runtime: ContainerRuntime;
  /** Used for host address discovery and the Ollama binding check. */
  exec: ExecFn;
  /** Create a directory and any missing parents. */
  mkdirp: (path: string) => void;
  userHome: string;
  awaitReady: (options: ReadinessOptions) => Promise<ReadyResult>;
}

export interface RunFlags {
  /** Wait for the web UI after starting it (default true). */
  wait: boolean;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** The configured Ollama URL, or one discovered from the host's addresses. */
export async function resolveOllamaUrl(config: LauncherConfig, exec: ExecFn): Promise<string> {
  return config.ollama.url ?? pickHostUrl(exec);
}

/**
 * Candidate URLs for the web UI, in priority order: the published host
 * port first, then the container port in case the mapping is not the one
 * in effect.
 */
export function webUiCandidates(ports: PortMapping): string[] {
  const host =
    ports.hostAddress && ports.hostAddress !== '0.0.0.0' ? ports.hostAddress : '127.0.0.1';
  const candidates = [`http://${host}:${ports.hostPort}/`];
  if (ports.containerPort !== ports.hostPort) {
    candidates.push(`http://${host}:${ports.containerPort}/`);
  }
  return candidates;
}

/** Build prober options from the `[readiness]` section. */
export function readinessOptions(config: LauncherConfig): ReadinessOptions {
  const { readiness } = config;
  const options: ReadinessOptions = {
    candidates: webUiCandidates(config.container.ports),
    totalTimeoutMs: readiness.timeout_seconds * 1000,
    pollIntervalMs: readiness.poll_interval_seconds * 1000,
  };
  if (readiness.signature !== '') {
    options.expectedSignature = readiness.signature;
  }
  return options;
}

// ---------------------------------------------------------------------------
// wait
// ---------------------------------------------------------------------------

/**
 * Wait for the web UI and report where it answered.
 *
 * @param advisory - When true a timeout still returns 0.
 * @returns Process exit code.
 */
export async function waitForWebUi(
  config: LauncherConfig,
  deps: RunDeps,
  advisory = false,
): Promise<number> {
  const options = readinessOptions(config);
  deps.stdout(`Waiting for Open-WebUI (up to ${config.readiness.timeout_seconds}s)...`);

  try {
    const ready = await deps.awaitReady(options);
    const unverified =
      options.expectedSignature !== undefined && ready.outcome === 'reachable-unverified';
    deps.stdout(
      `Open-WebUI is ready at ${ready.url}` + (unverified ? ' (content not verified)' : ''),
    );
    return 0;
  } catch (err) {
    if (isReadinessTimeoutError(err)) {
      deps.stderr(err.report());
      deps.stderr('Open-WebUI may still be starting; check the logs with: webui-launch logs');
      return advisory ? 0 : 1;
    }
    if (isConfigurationError(err)) {
      deps.stderr(`Configuration error: ${err.message}`);
      return 1;
    }
    throw err;
  }
}

// ---------------------------------------------------------------------------
// run
// ---------------------------------------------------------------------------

/**
 * Replace the web UI container and start a fresh one.
 *
 * 1. Resolve the Ollama URL and print advisory host warnings.
 * 2. Stop and remove any existing container of the same name (failures ignored).
 * 3. Start the new container detached.
 * 4. Wait for it to answer, unless `flags.wait` is false.
 *
 * @returns Process exit code.
 */
export async function runContainer(
  config: LauncherConfig,
  deps: RunDeps,
  flags: RunFlags = { wait: true },
): Promise<number> {
  const { container } = config;

  if (!(await deps.runtime.isAvailable())) {
    deps.stderr(
      "Apple 'container' CLI not found or not responding. It requires macOS 26+ on Apple Silicon.",
    );
    return 1;
  }

  const ollamaUrl = await resolveOllamaUrl(config, deps.exec);
  const dataDir = expandHome(container.data_dir, deps.userHome);
  deps.mkdirp(dataDir);

  deps.stdout(`Ollama URL: ${ollamaUrl}`);
  for (const check of await runHostChecks({ exec: deps.exec, ollamaUrl })) {
    if (check.status === 'warn') {
      deps.stderr(`WARN: ${check.detail}`);
      if (check.fix) {
        deps.stderr(`      Fix: ${check.fix}`);
      }
    }
  }

  deps.stdout(`Stopping and removing any existing '${container.name}'...`);
  try {
    await deps.runtime.stop(container.name);
  } catch (err) {
    logger.debug('stop failed (container may not exist)', { name: container.name, error: err });
  }
  try {
    await deps.runtime.remove(container.name);
  } catch (err) {
    logger.debug('remove failed (container may not exist)', { name: container.name, error: err });
  }

  deps.stdout('Starting Open-WebUI...');
  try {
    await deps.runtime.run({
      image: container.image,
      name: container.name,
      ports: [container.ports],
      volumes: [{ source: dataDir, target: CONTAINER_DATA_DIR }],
      env: { OLLAMA_BASE_URL: ollamaUrl },
    });
  } catch (err) {
    deps.stderr(`Failed to start container: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }

  deps.stdout(`Started. Visit http://localhost:${container.ports.hostPort}`);

  if (!flags.wait) {
    return 0;
  }
  return waitForWebUi(config, deps, true);
}
