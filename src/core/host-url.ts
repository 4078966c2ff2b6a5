/**
 * Host address discovery for the Ollama server.
 *
 * The web UI runs inside a VM, so `127.0.0.1` there is the VM itself. The
 * host is reached over its LAN address, or its mDNS `.local` name when no
 * address is assigned. Loopback is returned only as a last resort.
 */

import type { ExecFn } from './container/runtime.js';
import { createLogger, type Logger } from './logger.js';

/** Default Ollama API port. */
export const OLLAMA_PORT = 11434;

/** Network interfaces tried in order: built-in Wi-Fi/Ethernet, then a common USB/Thunderbolt adapter. */
export const LAN_INTERFACES = ['en0', 'en7'] as const;

async function tryExec(exec: ExecFn, file: string, args: readonly string[]): Promise<string> {
  try {
    const { stdout } = await exec(file, args);
    return stdout.trim();
  } catch {
    return '';
  }
}

/**
 * Pick the URL of the host's Ollama server as seen from a container.
 *
 * 1. First IPv4 address of {@link LAN_INTERFACES} (`ipconfig getifaddr`).
 * 2. `<LocalHostName>.local` if it answers a single ping.
 * 3. `http://127.0.0.1:<port>`.
 */
export async function pickHostUrl(
  exec: ExecFn,
  port = OLLAMA_PORT,
  logger: Logger = createLogger('host-url'),
): Promise<string> {
  for (const iface of LAN_INTERFACES) {
    const ip = await tryExec(exec, 'ipconfig', ['getifaddr', iface]);
    if (ip) {
      logger.debug('using LAN address', { iface, ip });
      return `http://${ip}:${port}`;
    }
  }

  const localHostName = await tryExec(exec, 'scutil', ['--get', 'LocalHostName']);
  if (localHostName) {
    const host = `${localHostName}.local`;
    try {
      await exec('ping', ['-c1', '-t1', host]);
      logger.debug('using mDNS hostname', { host });
      return `http://${host}:${port}`;
    } catch (err) {
      logger.debug('mDNS hostname did not answer ping', { host, error: err });
    }
  }

  logger.debug('falling back to loopback');
  return `http://127.0.0.1:${port}`;
}
