#!/usr/bin/env node
/**
 * Production entry point for webui-launch.
 *
 * Wires real dependencies (filesystem, child processes, HTTP) into
 * CliDeps and dispatches to the CLI command handler.
 *
 * Usage:
 *   webui-launch run
 *   webui-launch update
 *   webui-launch logs
 */

import { mkdirSync } from 'node:fs';
import { homedir } from 'node:os';

import { parseArgs, runCommand } from './cli.js';
import type { CliDeps } from './cli.js';
import { loadConfig } from './core/config-loader.js';
import { AppleContainerRuntime } from './core/container/apple-container-runtime.js';
import { defaultExec } from './core/container/runtime.js';
import { configureLogging, createLogger } from './core/logger.js';
import { awaitReady, httpGet } from './core/readiness/index.js';
import { resolveHome } from './types/config.js';

/**
 * Production main(): wires real deps and dispatches commands.
 *
 * @param argv - Process arguments (defaults to process.argv).
 * @returns Exit code (0 = success, non-zero = failure).
 */
export async function main(argv: string[] = process.argv): Promise<number> {
  const { command, flags } = parseArgs(argv);
  configureLogging({ level: flags['debug'] ? 'debug' : 'warn' });

  const deps: CliDeps = {
    stdout: (msg: string) => process.stdout.write(`${msg}\n`),
    stderr: (msg: string) => process.stderr.write(`${msg}\n`),
    loadConfig: () => {
      const config = loadConfig(resolveHome());
      if (!flags['debug']) {
        configureLogging({ level: config.logging.level });
      }
      return config;
    },
    runtime: new AppleContainerRuntime(),
    exec: defaultExec,
    mkdirp: (path: string) => mkdirSync(path, { recursive: true }),
    userHome: homedir(),
    awaitReady: (options) => awaitReady(options),
    httpGet,
  };

  return runCommand(command, deps, flags);
}

// ---------------------------------------------------------------------------
// Entry point: run when executed directly
// ---------------------------------------------------------------------------

/* c8 ignore next 11 */
main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    createLogger('main').error('unhandled error', { error: err });
    process.stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exitCode = 1;
  },
);
