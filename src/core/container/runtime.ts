/**
 * Container runtime types and process plumbing for webui-launch.
 *
 * The launcher drives a single engine (Apple's `container` CLI), but the
 * run options and exec/stream seams are kept engine-neutral so adapters
 * can be tested with injected functions instead of real binaries.
 */

import { execFile as execFileCb, spawn } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFileCb);

// ---------------------------------------------------------------------------
// Run options
// ---------------------------------------------------------------------------

/** A bind-mount from the host filesystem into the container. */
export interface VolumeMount {
  /** Absolute path on the host. */
  source: string;
  /** Absolute path inside the container. */
  target: string;
}

/**
 * A TCP port mapping from host to container.
 *
 * Rendered as `hostPort:containerPort`, or `hostAddress:hostPort:containerPort`
 * when a bind address is given. Without one the runtime publishes on all
 * host interfaces.
 */
export interface PortMapping {
  hostPort: number;
  containerPort: number;
  hostAddress?: string;
}

/** Options for launching a detached container. */
export interface ContainerRunOptions {
  /** Image reference (e.g. `"ghcr.io/open-webui/open-webui:main"`). */
  image: string;
  /** Container name; also the handle later commands use. */
  name: string;
  ports: PortMapping[];
  volumes: VolumeMount[];
  /** Environment variables injected into the container. */
  env: Record<string, string>;
}

// ---------------------------------------------------------------------------
// Runtime interface
// ---------------------------------------------------------------------------

/**
 * The container operations the launcher commands need. Containers are
 * addressed by name, since every command targets the one configured name.
 */
export interface ContainerRuntime {
  readonly name: string;

  /** Check whether the engine binary is installed and responsive. */
  isAvailable(): Promise<boolean>;

  pullImage(image: string): Promise<void>;
  inspectImage(image: string): Promise<unknown>;
  pruneImages(): Promise<void>;

  /** Start a detached container and return its id. */
  run(options: ContainerRunOptions): Promise<string>;
  stop(name: string): Promise<void>;
  remove(name: string): Promise<void>;
  inspectContainer(name: string): Promise<unknown>;
  /** Stream logs until the user interrupts; resolves the exit code. */
  followLogs(name: string): Promise<number>;
}

// ---------------------------------------------------------------------------
// Exec / stream seams
// ---------------------------------------------------------------------------

/**
 * Injectable exec function for shelling out to the container CLI.
 * Rejects when the binary is missing or exits non-zero.
 */
export type ExecFn = (
  file: string,
  args: readonly string[],
) => Promise<{ stdout: string; stderr: string }>;

/**
 * Injectable function that runs a process attached to the terminal and
 * resolves with its exit code. Used for `logs -f`.
 */
export type StreamFn = (file: string, args: readonly string[]) => Promise<number>;

/** Default exec implementation, wrapping child_process.execFile. */
export const defaultExec: ExecFn = async (file, args) => {
  return execFileAsync(file, [...args], { encoding: 'utf-8' });
};

/**
 * Default stream implementation: spawns with inherited stdio so output
 * (and Ctrl-C) pass straight through to the user's terminal.
 */
export const defaultStream: StreamFn = (file, args) => {
  return new Promise<number>((resolve, reject) => {
    const child = spawn(file, [...args], { stdio: 'inherit' });
    child.on('error', reject);
    child.on('close', (code) => resolve(code ?? 1));
  });
};

/** Render a port mapping as the value of a `--publish` flag. */
export function formatPortMapping(mapping: PortMapping): string {
  const ports = `${mapping.hostPort}:${mapping.containerPort}`;
  return mapping.hostAddress ? `${mapping.hostAddress}:${ports}` : ports;
}
