import { describe, it, expect, beforeEach, vi } from 'vitest';
import { AppleContainerRuntime } from './apple-container-runtime.js';
import { formatPortMapping, type ContainerRuntime, type ContainerRunOptions } from './runtime.js';
import type { Logger } from '../logger.js';

// ---------------------------------------------------------------------------
// Mock exec helper
// ---------------------------------------------------------------------------

type ExecCall = { file: string; args: readonly string[] };

function createMockExec() {
  const calls: ExecCall[] = [];
  const handler =
    vi.fn<(file: string, args: readonly string[]) => Promise<{ stdout: string; stderr: string }>>();
  handler.mockResolvedValue({ stdout: '', stderr: '' });

  const exec = async (file: string, args: readonly string[]) => {
    calls.push({ file, args });
    return handler(file, args);
  };

  return { exec, handler, calls };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function defaultRunOptions(overrides?: Partial<ContainerRunOptions>): ContainerRunOptions {
  return {
    image: 'ghcr.io/open-webui/open-webui:main',
    name: 'open-webui',
    ports: [{ hostPort: 3000, containerPort: 8080 }],
    volumes: [{ source: '/Users/test/.open-webui', target: '/app/backend/data' }],
    env: { OLLAMA_BASE_URL: 'http://192.168.1.20:11434' },
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('AppleContainerRuntime', () => {
  let mock: ReturnType<typeof createMockExec>;
  let runtime: AppleContainerRuntime;

  beforeEach(() => {
    mock = createMockExec();
    runtime = new AppleContainerRuntime({ exec: mock.exec });
  });

  it('implements the ContainerRuntime interface', () => {
    const rt: ContainerRuntime = runtime;
    expect(rt.name).toBe('apple-container');
  });

  // -----------------------------------------------------------------------
  // isAvailable
  // -----------------------------------------------------------------------

  describe('isAvailable', () => {
    it('returns true when `container list` succeeds', async () => {
      expect(await runtime.isAvailable()).toBe(true);
      expect(mock.calls).toEqual([{ file: 'container', args: ['list'] }]);
    });

    it('returns false when the binary is missing', async () => {
      mock.handler.mockRejectedValue(new Error('spawn container ENOENT'));
      expect(await runtime.isAvailable()).toBe(false);
    });

    it('uses a custom binary path', async () => {
      const custom = new AppleContainerRuntime({
        exec: mock.exec,
        containerPath: '/usr/local/bin/container',
      });
      await custom.isAvailable();
      expect(mock.calls[0].file).toBe('/usr/local/bin/container');
    });
  });

  // -----------------------------------------------------------------------
  // Images
  // -----------------------------------------------------------------------

  describe('images', () => {
    it('pulls an image', async () => {
      await runtime.pullImage('ghcr.io/open-webui/open-webui:main');
      expect(mock.calls[0].args).toEqual(['image', 'pull', 'ghcr.io/open-webui/open-webui:main']);
    });

    it('propagates pull failures', async () => {
      mock.handler.mockRejectedValue(new Error('network unreachable'));
      await expect(runtime.pullImage('img')).rejects.toThrow('network unreachable');
    });

    it('parses image inspect output', async () => {
      mock.handler.mockResolvedValue({
        stdout: '[{"digest":"sha256:abc"}]\n',
        stderr: '',
      });

      const inspected = await runtime.inspectImage('img');

      expect(mock.calls[0].args).toEqual(['image', 'inspect', 'img']);
      expect(inspected).toEqual([{ digest: 'sha256:abc' }]);
    });

    it('prunes unreferenced images', async () => {
      await runtime.pruneImages();
      expect(mock.calls[0].args).toEqual(['image', 'prune', '-f']);
    });
  });

  // -----------------------------------------------------------------------
  // Containers
  // -----------------------------------------------------------------------

  describe('run', () => {
    it('passes name, ports, volumes, env and image in order', async () => {
      mock.handler.mockResolvedValue({ stdout: 'open-webui\n', stderr: '' });

      const id = await runtime.run(defaultRunOptions());

      expect(id).toBe('open-webui');
      expect(mock.calls[0].args).toEqual([
        'run',
        '--detach',
        '--name',
        'open-webui',
        '--publish',
        '3000:8080',
        '--volume',
        '/Users/test/.open-webui:/app/backend/data',
        '--env',
        'OLLAMA_BASE_URL=http://192.168.1.20:11434',
        'ghcr.io/open-webui/open-webui:main',
      ]);
    });

    it('renders bind addresses', () => {
      const args = runtime.buildRunArgs(
        defaultRunOptions({
          ports: [{ hostAddress: '127.0.0.1', hostPort: 3000, containerPort: 8080 }],
          volumes: [{ source: '/data', target: '/app/backend/data' }],
          env: {},
        }),
      );

      expect(args).toEqual([
        'run',
        '--detach',
        '--name',
        'open-webui',
        '--publish',
        '127.0.0.1:3000:8080',
        '--volume',
        '/data:/app/backend/data',
        'ghcr.io/open-webui/open-webui:main',
      ]);
    });
  });

  describe('stop / remove / inspect', () => {
    it('stops by name', async () => {
      await runtime.stop('open-webui');
      expect(mock.calls[0].args).toEqual(['stop', 'open-webui']);
    });

    it('removes by name', async () => {
      await runtime.remove('open-webui');
      expect(mock.calls[0].args).toEqual(['rm', 'open-webui']);
    });

    it('parses container inspect output', async () => {
      mock.handler.mockResolvedValue({
        stdout: '[{"image":{"digest":"sha256:def"}}]',
        stderr: '',
      });

      expect(await runtime.inspectContainer('open-webui')).toEqual([
        { image: { digest: 'sha256:def' } },
      ]);
      expect(mock.calls[0].args).toEqual(['inspect', 'open-webui']);
    });
  });

  describe('followLogs', () => {
    it('streams `logs -f` and resolves its exit code', async () => {
      const stream = vi.fn<(file: string, args: readonly string[]) => Promise<number>>();
      stream.mockResolvedValue(130);
      const rt = new AppleContainerRuntime({ exec: mock.exec, stream });

      expect(await rt.followLogs('open-webui')).toBe(130);
      expect(stream).toHaveBeenCalledWith('container', ['logs', '-f', 'open-webui']);
      expect(mock.calls).toHaveLength(0);
    });
  });

  describe('logging', () => {
    it('logs each invocation at debug level', async () => {
      const logger: Logger = {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        child: vi.fn(),
      };
      const rt = new AppleContainerRuntime({ exec: mock.exec, logger });

      await rt.stop('open-webui');

      expect(logger.debug).toHaveBeenCalledWith('exec', { args: ['stop', 'open-webui'] });
    });
  });
});

describe('formatPortMapping', () => {
  it('renders host:container', () => {
    expect(formatPortMapping({ hostPort: 3000, containerPort: 8080 })).toBe('3000:8080');
  });

  it('prefixes the bind address', () => {
    expect(
      formatPortMapping({ hostAddress: '0.0.0.0', hostPort: 3000, containerPort: 8080 }),
    ).toBe('0.0.0.0:3000:8080');
  });
});
