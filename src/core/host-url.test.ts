import { describe, it, expect, vi } from 'vitest';
import { pickHostUrl } from './host-url.js';
import type { Logger } from './logger.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

type Responses = Record<string, string | Error>;

/** Exec stub keyed by `file arg1 arg2...`; unknown commands fail. */
function createMockExec(responses: Responses) {
  return vi.fn(async (file: string, args: readonly string[]) => {
    const key = [file, ...args].join(' ');
    const response = responses[key];
    if (response === undefined || response instanceof Error) {
      throw response ?? new Error(`command failed: ${key}`);
    }
    return { stdout: response, stderr: '' };
  });
}

function silentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), child: vi.fn() };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('pickHostUrl', () => {
  it('uses the en0 address first', async () => {
    const exec = createMockExec({ 'ipconfig getifaddr en0': '192.168.1.20\n' });

    expect(await pickHostUrl(exec, undefined, silentLogger())).toBe('http://192.168.1.20:11434');
    expect(exec).toHaveBeenCalledTimes(1);
  });

  it('falls back to en7 when en0 has no address', async () => {
    const exec = createMockExec({
      'ipconfig getifaddr en0': '',
      'ipconfig getifaddr en7': '10.0.0.5\n',
    });

    expect(await pickHostUrl(exec, undefined, silentLogger())).toBe('http://10.0.0.5:11434');
  });

  it('uses the mDNS name when no LAN address is assigned and it answers ping', async () => {
    const exec = createMockExec({
      'scutil --get LocalHostName': 'studio\n',
      'ping -c1 -t1 studio.local': 'PING studio.local',
    });

    expect(await pickHostUrl(exec, undefined, silentLogger())).toBe('http://studio.local:11434');
  });

  it('falls back to loopback when the mDNS name does not answer', async () => {
    const exec = createMockExec({ 'scutil --get LocalHostName': 'studio\n' });

    expect(await pickHostUrl(exec, undefined, silentLogger())).toBe('http://127.0.0.1:11434');
  });

  it('falls back to loopback when nothing is known', async () => {
    const exec = createMockExec({});

    expect(await pickHostUrl(exec, undefined, silentLogger())).toBe('http://127.0.0.1:11434');
    expect(exec.mock.calls.map(([file, args]) => [file, ...args].join(' '))).toEqual([
      'ipconfig getifaddr en0',
      'ipconfig getifaddr en7',
      'scutil --get LocalHostName',
    ]);
  });

  it('uses the given port', async () => {
    const exec = createMockExec({ 'ipconfig getifaddr en0': '192.168.1.20' });

    expect(await pickHostUrl(exec, 8000, silentLogger())).toBe('http://192.168.1.20:8000');
  });
});
