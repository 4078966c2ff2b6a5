import { describe, it, expect, vi, beforeEach } from 'vitest';
import { runUpdate } from './update-command.js';
import type { RunDeps } from './run-command.js';
import { MockContainerRuntime } from './core/container/mock-runtime.js';
import type { ReadinessOptions, ReadyResult } from './core/readiness/index.js';
import { DEFAULT_CONFIG, type LauncherConfig } from './types/config.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const IMAGE = 'ghcr.io/open-webui/open-webui:main';
const OLD_DIGEST = 'sha256:1111111111111111111111111111111111111111111111111111111111111111';
const NEW_DIGEST = 'sha256:2222222222222222222222222222222222222222222222222222222222222222';

function createConfig(): LauncherConfig {
  const config = structuredClone(DEFAULT_CONFIG);
  config.ollama.url = 'http://192.168.1.20:11434';
  return config;
}

function createDeps() {
  const runtime = new MockContainerRuntime();
  const deps = {
    stdout: vi.fn<(msg: string) => void>(),
    stderr: vi.fn<(msg: string) => void>(),
    runtime,
    exec: vi.fn(async (file: string, _args: readonly string[]) => {
      throw new Error(`${file} not available`);
    }),
    mkdirp: vi.fn<(path: string) => void>(),
    userHome: '/Users/test',
    awaitReady: vi.fn<(options: ReadinessOptions) => Promise<ReadyResult>>().mockResolvedValue({
      url: 'http://127.0.0.1:3000/',
      outcome: 'reachable-verified',
      status: 200,
      rounds: 4,
      elapsedMs: 3_120,
    }),
  } satisfies RunDeps;
  return { deps, runtime };
}

/** Start a container from a local image with the given digest. */
async function seedRunning(runtime: MockContainerRuntime, digest: string): Promise<void> {
  runtime.addLocalImage(IMAGE, digest);
  await runtime.run({ image: IMAGE, name: 'open-webui', ports: [], volumes: [], env: {} });
}

function stdoutLines(deps: ReturnType<typeof createDeps>['deps']): string[] {
  return deps.stdout.mock.calls.map(([msg]) => msg);
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('runUpdate', () => {
  let config: LauncherConfig;

  beforeEach(() => {
    config = createConfig();
  });

  it('leaves an up-to-date container alone', async () => {
    const { deps, runtime } = createDeps();
    await seedRunning(runtime, NEW_DIGEST);
    runtime.setRemoteDigest(IMAGE, NEW_DIGEST);

    expect(await runUpdate(config, deps)).toBe(0);

    expect(stdoutLines(deps)).toEqual([`Pulling: ${IMAGE}`, `Open-WebUI is up to date (${NEW_DIGEST})`]);
    expect(runtime.getContainer('open-webui')?.id).toBe('mock-1');
    expect(runtime.operations).not.toContain('image prune');
  });

  it('recreates the container when the pulled digest differs', async () => {
    const { deps, runtime } = createDeps();
    await seedRunning(runtime, OLD_DIGEST);
    runtime.setRemoteDigest(IMAGE, NEW_DIGEST);

    expect(await runUpdate(config, deps, { wait: false })).toBe(0);

    expect(stdoutLines(deps)).toEqual([
      `Pulling: ${IMAGE}`,
      `Updating container to ${NEW_DIGEST}`,
      'Ollama URL: http://192.168.1.20:11434',
      "Stopping and removing any existing 'open-webui'...",
      'Starting Open-WebUI...',
      'Started. Visit http://localhost:3000',
      'Pruning old images...',
    ]);
    expect(runtime.getContainer('open-webui')).toMatchObject({
      id: 'mock-2',
      imageDigest: NEW_DIGEST,
    });
    expect(runtime.operations.at(-1)).toBe('image prune');
  });

  it('waits for the recreated container by default', async () => {
    const { deps, runtime } = createDeps();
    runtime.setRemoteDigest(IMAGE, NEW_DIGEST);

    expect(await runUpdate(config, deps)).toBe(0);
    expect(deps.awaitReady).toHaveBeenCalledOnce();
    expect(stdoutLines(deps)).toContain('Open-WebUI is ready at http://127.0.0.1:3000/');
  });

  it('creates the container when none exists', async () => {
    const { deps, runtime } = createDeps();
    runtime.setRemoteDigest(IMAGE, NEW_DIGEST);

    expect(await runUpdate(config, deps, { wait: false })).toBe(0);
    expect(runtime.getContainer('open-webui')?.status).toBe('running');
  });

  it('recreates when the digest cannot be read', async () => {
    const { deps, runtime } = createDeps();
    await seedRunning(runtime, '');

    expect(await runUpdate(config, deps, { wait: false })).toBe(0);
    expect(stdoutLines(deps)[1]).toBe(`Updating container to ${IMAGE}`);
  });

  it('fails when the pull fails', async () => {
    const { deps, runtime } = createDeps();
    runtime.simulatePullFailure('unauthorized: authentication required');

    expect(await runUpdate(config, deps)).toBe(1);
    expect(deps.stderr).toHaveBeenCalledWith(
      'Image pull failed: unauthorized: authentication required',
    );
    expect(runtime.operations).toEqual([`image pull ${IMAGE}`]);
  });

  it('does not prune when the recreate fails', async () => {
    const { deps, runtime } = createDeps();
    runtime.setRemoteDigest(IMAGE, NEW_DIGEST);
    runtime.simulateRunFailure('no space left on device');

    expect(await runUpdate(config, deps)).toBe(1);
    expect(runtime.operations).not.toContain('image prune');
  });

  it('succeeds even when pruning fails', async () => {
    const { deps, runtime } = createDeps();
    runtime.setRemoteDigest(IMAGE, NEW_DIGEST);
    runtime.simulatePruneFailure('image in use');

    expect(await runUpdate(config, deps, { wait: false })).toBe(0);
    expect(runtime.operations.at(-1)).toBe('image prune');
  });
});
