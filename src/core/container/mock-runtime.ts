/**
 * Mock container runtime for testing.
 *
 * Implements the {@link ContainerRuntime} interface with in-memory state,
 * so the `run`, `update` and `logs` commands can be tested without the
 * `container` CLI. Containers are keyed by name and remember the digest of
 * the image they were started from; pulls copy a digest from a simulated
 * registry.
 *
 * Supports failure simulation for pulls, runs and prunes.
 */

import type { ContainerRunOptions, ContainerRuntime } from './runtime.js';

// ---------------------------------------------------------------------------
// Internal container record
// ---------------------------------------------------------------------------

export interface MockContainerRecord {
  id: string;
  options: ContainerRunOptions;
  /** Digest of the local image at the time the container started. */
  imageDigest: string;
  status: 'running' | 'stopped';
}

// ---------------------------------------------------------------------------
// MockContainerRuntime
// ---------------------------------------------------------------------------

export class MockContainerRuntime implements ContainerRuntime {
  readonly name = 'mock' as const;

  /** Every runtime call in order, e.g. `'stop open-webui'`. */
  readonly operations: string[] = [];

  private readonly containers = new Map<string, MockContainerRecord>();

  /** Local images and their digests. */
  private readonly images = new Map<string, string>();

  /** Digests a pull would fetch. */
  private readonly registry = new Map<string, string>();

  private idCounter = 0;

  // -- Failure simulation flags --

  private available = true;
  private nextPullFailure: string | null = null;
  private nextRunFailure: string | null = null;
  private pruneFailure: string | null = null;
  private logsExitCode = 0;

  // -----------------------------------------------------------------------
  // Availability
  // -----------------------------------------------------------------------

  async isAvailable(): Promise<boolean> {
    this.operations.push('list');
    return this.available;
  }

  // -----------------------------------------------------------------------
  // Images
  // -----------------------------------------------------------------------

  async pullImage(image: string): Promise<void> {
    this.operations.push(`image pull ${image}`);
    if (this.nextPullFailure !== null) {
      const message = this.nextPullFailure;
      this.nextPullFailure = null;
      throw new Error(message);
    }
    this.images.set(image, this.registry.get(image) ?? '');
  }

  async inspectImage(image: string): Promise<unknown> {
    this.operations.push(`image inspect ${image}`);
    const digest = this.images.get(image);
    if (digest === undefined) {
      throw new Error(`image "${image}" not found`);
    }
    return [digest ? { digest } : {}];
  }

  async pruneImages(): Promise<void> {
    this.operations.push('image prune');
    if (this.pruneFailure !== null) {
      throw new Error(this.pruneFailure);
    }
  }

  // -----------------------------------------------------------------------
  // Containers
  // -----------------------------------------------------------------------

  async run(options: ContainerRunOptions): Promise<string> {
    this.operations.push(`run ${options.name}`);
    if (this.nextRunFailure !== null) {
      const message = this.nextRunFailure;
      this.nextRunFailure = null;
      throw new Error(message);
    }
    if (this.containers.has(options.name)) {
      throw new Error(`container "${options.name}" already exists`);
    }

    this.idCounter += 1;
    const id = `mock-${this.idCounter}`;
    this.containers.set(options.name, {
      id,
      options,
      imageDigest: this.images.get(options.image) ?? '',
      status: 'running',
    });
    return id;
  }

  async stop(name: string): Promise<void> {
    this.operations.push(`stop ${name}`);
    this.require(name).status = 'stopped';
  }

  async remove(name: string): Promise<void> {
    this.operations.push(`rm ${name}`);
    this.require(name);
    this.containers.delete(name);
  }

  async inspectContainer(name: string): Promise<unknown> {
    this.operations.push(`inspect ${name}`);
    const record = this.require(name);
    return [{ image: record.imageDigest ? { digest: record.imageDigest } : {} }];
  }

  async followLogs(name: string): Promise<number> {
    this.operations.push(`logs -f ${name}`);
    this.require(name);
    return this.logsExitCode;
  }

  // -----------------------------------------------------------------------
  // Failure simulation and setup
  // -----------------------------------------------------------------------

  /** Control what `isAvailable()` returns. */
  setAvailable(value: boolean): void {
    this.available = value;
  }

  /** Make the next `pullImage()` reject. */
  simulatePullFailure(error?: string): void {
    this.nextPullFailure = error ?? 'Pull failed';
  }

  /** Make the next `run()` reject. */
  simulateRunFailure(error?: string): void {
    this.nextRunFailure = error ?? 'Run failed';
  }

  /** Make every `pruneImages()` reject. */
  simulatePruneFailure(error?: string): void {
    this.pruneFailure = error ?? 'Prune failed';
  }

  setLogsExitCode(code: number): void {
    this.logsExitCode = code;
  }

  /** Set the digest a pull of `image` will fetch. */
  setRemoteDigest(image: string, digest: string): void {
    this.registry.set(image, digest);
  }

  /** Pretend `image` is already present locally. */
  addLocalImage(image: string, digest: string): void {
    this.images.set(image, digest);
  }

  // -----------------------------------------------------------------------
  // Inspection helpers
  // -----------------------------------------------------------------------

  getContainer(name: string): MockContainerRecord | undefined {
    return this.containers.get(name);
  }

  private require(name: string): MockContainerRecord {
    const record = this.containers.get(name);
    if (!record) {
      throw new Error(`container "${name}" not found`);
    }
    return record;
  }
}
