import { describe, it, expect, vi } from 'vitest';
import { testOllama, type OllamaTestDeps } from './ollama-command.js';
import type { HttpGetOptions, HttpGetResult } from './core/readiness/index.js';
import { DEFAULT_CONFIG, type LauncherConfig } from './types/config.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const TAGS = '{"models":[{"name":"llama3.2:latest","model":"llama3.2:latest"}]}';

function createConfig(url?: string): LauncherConfig {
  const config = structuredClone(DEFAULT_CONFIG);
  if (url !== undefined) config.ollama.url = url;
  return config;
}

function createDeps(response: HttpGetResult | Error) {
  const deps = {
    stdout: vi.fn<(msg: string) => void>(),
    exec: vi.fn(async (file: string, args: readonly string[]) => {
      if (file === 'ipconfig' && args[1] === 'en0') return { stdout: '10.0.0.7\n', stderr: '' };
      throw new Error(`${file} failed`);
    }),
    httpGet: vi.fn(async (_url: string, _options: HttpGetOptions) => {
      if (response instanceof Error) throw response;
      return response;
    }),
  } satisfies OllamaTestDeps;
  return deps;
}

function output(deps: ReturnType<typeof createDeps>): string[] {
  return deps.stdout.mock.calls.map(([msg]) => msg);
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('testOllama', () => {
  it('prints the start of /api/tags', async () => {
    const deps = createDeps({ status: 200, body: TAGS, truncated: false });

    expect(await testOllama(createConfig('http://192.168.1.20:11434'), deps)).toBe(0);

    expect(deps.httpGet).toHaveBeenCalledWith('http://192.168.1.20:11434/api/tags', {
      timeoutMs: 5_000,
      maxBodyBytes: 200,
    });
    expect(output(deps)).toEqual([
      'Testing Ollama at: http://192.168.1.20:11434',
      'First 200 bytes of /api/tags:',
      TAGS,
    ]);
  });

  it('marks a truncated body', async () => {
    const deps = createDeps({ status: 200, body: '{"models":[', truncated: true });

    await testOllama(createConfig('http://192.168.1.20:11434'), deps);

    expect(output(deps).at(-1)).toBe('{"models":[ ...');
  });

  it('tests the discovered address when none is configured', async () => {
    const deps = createDeps({ status: 200, body: TAGS, truncated: false });

    await testOllama(createConfig(), deps);

    expect(output(deps)[0]).toBe('Testing Ollama at: http://10.0.0.7:11434');
    expect(deps.httpGet).toHaveBeenCalledWith('http://10.0.0.7:11434/api/tags', expect.any(Object));
  });

  it('fails on a non-2xx status', async () => {
    const deps = createDeps({ status: 404, body: '404 page not found', truncated: false });

    expect(await testOllama(createConfig('http://192.168.1.20:11434'), deps)).toBe(1);
    expect(output(deps).at(-1)).toBe('ERROR: HTTP 404');
  });

  it('fails when Ollama cannot be reached', async () => {
    const deps = createDeps(new Error('connect ECONNREFUSED 192.168.1.20:11434'));

    expect(await testOllama(createConfig('http://192.168.1.20:11434'), deps)).toBe(1);
    expect(output(deps).at(-1)).toBe('ERROR: connect ECONNREFUSED 192.168.1.20:11434');
  });
});
