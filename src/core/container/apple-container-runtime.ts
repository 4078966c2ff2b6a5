/**
 * Apple Container runtime adapter.
 *
 * Drives the macOS 26+ `container` CLI (Apple Silicon only). Each
 * container runs in its own lightweight VM, so the web UI reaches the
 * host's Ollama over the LAN address rather than a Docker-style
 * `host.docker.internal` alias.
 *
 * Every method is a thin argument-list builder over the injected
 * {@link ExecFn}; callers decide which failures to tolerate.
 */

import type { ContainerRunOptions, ContainerRuntime, ExecFn, StreamFn } from './runtime.js';
import { defaultExec, defaultStream, formatPortMapping } from './runtime.js';
import { createLogger, type Logger } from '../logger.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface AppleContainerRuntimeOptions {
  /** Injectable exec function for testing. Defaults to promisified execFile. */
  exec?: ExecFn;
  /** Injectable attached-process runner. Defaults to spawn with inherited stdio. */
  stream?: StreamFn;
  /** Path to the container binary. Defaults to `'container'`. */
  containerPath?: string;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// AppleContainerRuntime
// ---------------------------------------------------------------------------

export class AppleContainerRuntime implements ContainerRuntime {
  readonly name = 'apple-container' as const;

  private readonly exec: ExecFn;
  private readonly stream: StreamFn;
  private readonly containerPath: string;
  private readonly logger: Logger;

  constructor(options?: AppleContainerRuntimeOptions) {
    this.exec = options?.exec ?? defaultExec;
    this.stream = options?.stream ?? defaultStream;
    this.containerPath = options?.containerPath ?? 'container';
    this.logger = options?.logger ?? createLogger('container:apple');
  }

  // -----------------------------------------------------------------------
  // Availability
  // -----------------------------------------------------------------------

  async isAvailable(): Promise<boolean> {
    try {
      await this.container('list');
      return true;
    } catch {
      return false;
    }
  }

  // -----------------------------------------------------------------------
  // Images
  // -----------------------------------------------------------------------

  async pullImage(image: string): Promise<void> {
    await this.container('image', 'pull', image);
  }

  /** Parsed output of `container image inspect`. */
  async inspectImage(image: string): Promise<unknown> {
    const { stdout } = await this.container('image', 'inspect', image);
    return JSON.parse(stdout.trim());
  }

  /** Remove images no container references. */
  async pruneImages(): Promise<void> {
    await this.container('image', 'prune', '-f');
  }

  // -----------------------------------------------------------------------
  // Containers
  // -----------------------------------------------------------------------

  /** Start a detached container and return the id the CLI prints. */
  async run(options: ContainerRunOptions): Promise<string> {
    const { stdout } = await this.container(...this.buildRunArgs(options));
    return stdout.trim();
  }

  async stop(name: string): Promise<void> {
    await this.container('stop', name);
  }

  async remove(name: string): Promise<void> {
    await this.container('rm', name);
  }

  /** Parsed output of `container inspect`. */
  async inspectContainer(name: string): Promise<unknown> {
    const { stdout } = await this.container('inspect', name);
    return JSON.parse(stdout.trim());
  }

  /** Follow container logs on the caller's terminal; resolves the CLI's exit code. */
  async followLogs(name: string): Promise<number> {
    return this.stream(this.containerPath, ['logs', '-f', name]);
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  buildRunArgs(options: ContainerRunOptions): string[] {
    const args: string[] = ['run', '--detach', '--name', options.name];

    for (const port of options.ports) {
      args.push('--publish', formatPortMapping(port));
    }

    for (const vol of options.volumes) {
      args.push('--volume', `${vol.source}:${vol.target}`);
    }

    for (const [key, value] of Object.entries(options.env)) {
      args.push('--env', `${key}=${value}`);
    }

    args.push(options.image);
    return args;
  }

  private async container(...args: string[]): Promise<{ stdout: string; stderr: string }> {
    this.logger.debug('exec', { args });
    return this.exec(this.containerPath, args);
  }
}
