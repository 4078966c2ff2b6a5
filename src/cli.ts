/**
 * webui-launch CLI.
 *
 * Provides the `webui-launch` command with subcommands:
 *   - `run`: Recreate the Open WebUI container and wait for it (default).
 *   - `update`: Pull the image; recreate only if its digest changed.
 *   - `logs`: Follow the container's logs.
 *   - `test`: Fetch `/api/tags` from Ollama as a connectivity check.
 *   - `wait`: Wait for the web UI to answer, without touching the container.
 *
 * All external dependencies are injected via {@link CliDeps} for testability.
 * `main.ts` wires production dependencies and calls `runCommand()`.
 */

import { VERSION } from './index.js';
import { isConfigurationError } from './core/readiness/index.js';
import { runContainer, waitForWebUi, type RunDeps } from './run-command.js';
import { runUpdate } from './update-command.js';
import { testOllama, type OllamaTestDeps } from './ollama-command.js';
import type { LauncherConfig } from './types/config.js';

// ---------------------------------------------------------------------------
// CLI dependency injection
// ---------------------------------------------------------------------------

/** Injectable dependencies for CLI commands. */
export interface CliDeps extends RunDeps, OllamaTestDeps {
  /** Load defaults, config.toml and environment overrides. */
  loadConfig: () => LauncherConfig;
}

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

/** Parsed CLI arguments. */
export interface ParsedArgs {
  command: string;
  flags: Record<string, boolean>;
}

/**
 * Parse process.argv into a command and flags.
 *
 * Expects argv in the form: [node, script, command?, ...flags]
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const flags: Record<string, boolean> = {};
  let command = '';

  for (const arg of args) {
    if (arg.startsWith('--')) {
      flags[arg.slice(2)] = true;
    } else if (!command) {
      command = arg;
    }
  }

  return { command, flags };
}

// ---------------------------------------------------------------------------
// Command dispatch
// ---------------------------------------------------------------------------

export const USAGE = `Usage: webui-launch [command]

Commands:
  run        Recreate the Open WebUI container and wait for it (default)
  update     Pull the image and recreate the container if it changed
  logs       Follow the container logs
  test       Quick connectivity test to Ollama
  wait       Wait for the web UI to answer

Options:
  --no-wait    Do not wait for the web UI after run/update
  --debug      Log debug output to stderr
  --version    Show version number
  --help       Show this help message

Environment:
  OLLAMA_URL, OWUI_NAME, OWUI_PORTS, OWUI_DATA, OWUI_IMAGE,
  OWUI_READY_TIMEOUT, OWUI_POLL_INTERVAL, OWUI_READY_SIGNATURE, LOG_LEVEL,
  WEBUI_LAUNCH_HOME (directory holding config.toml)`;

const COMMANDS: ReadonlySet<string> = new Set(['run', 'update', 'logs', 'test', 'wait']);

/**
 * Dispatch a command string to the appropriate handler. An empty command
 * means `run`.
 *
 * @returns Process exit code (0 = success, 1 = failure).
 */
export async function runCommand(
  command: string,
  deps: CliDeps,
  flags: Record<string, boolean> = {},
): Promise<number> {
  if (flags['version']) {
    deps.stdout(VERSION);
    return 0;
  }

  if (flags['help'] || command === 'help') {
    deps.stdout(USAGE);
    return 0;
  }

  const name = command || 'run';
  if (!COMMANDS.has(name)) {
    deps.stderr(`Unknown command: "${command}"\n`);
    deps.stdout(USAGE);
    return 1;
  }

  let config: LauncherConfig;
  try {
    config = deps.loadConfig();
  } catch (err) {
    if (isConfigurationError(err)) {
      deps.stderr(`Configuration error: ${err.message}`);
      return 1;
    }
    throw err;
  }

  const wait = flags['no-wait'] !== true;

  switch (name) {
    case 'update':
      return runUpdate(config, deps, { wait });
    case 'logs':
      return logs(config, deps);
    case 'test':
      return testOllama(config, deps);
    case 'wait':
      return waitForWebUi(config, deps);
    default:
      return runContainer(config, deps, { wait });
  }
}

// ---------------------------------------------------------------------------
// logs
// ---------------------------------------------------------------------------

/** Follow the container logs until interrupted. */
export async function logs(config: LauncherConfig, deps: CliDeps): Promise<number> {
  try {
    return await deps.runtime.followLogs(config.container.name);
  } catch (err) {
    deps.stderr(`Could not follow logs: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}
