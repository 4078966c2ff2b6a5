/**
 * `webui-launch test`: a quick connectivity check against Ollama.
 *
 * Fetches `/api/tags` from the URL the container would be given and prints
 * the first 200 bytes, so a wrong address or a loopback-only binding shows
 * up before the web UI is involved.
 */

import type { ExecFn } from './core/container/runtime.js';
import { describeError, type HttpGetOptions, type HttpGetResult } from './core/readiness/index.js';
import { resolveOllamaUrl } from './run-command.js';
import type { LauncherConfig } from './types/config.js';

/** Bytes of the response shown to the user. */
export const PREVIEW_BYTES = 200;

const TEST_TIMEOUT_MS = 5_000;

export interface OllamaTestDeps {
  stdout: (msg: string) => void;
  exec: ExecFn;
  httpGet: (url: string, options: HttpGetOptions) => Promise<HttpGetResult>;
}

/** @returns Process exit code. */
export async function testOllama(config: LauncherConfig, deps: OllamaTestDeps): Promise<number> {
  const url = await resolveOllamaUrl(config, deps.exec);
  deps.stdout(`Testing Ollama at: ${url}`);
  deps.stdout(`First ${PREVIEW_BYTES} bytes of /api/tags:`);

  let result: HttpGetResult;
  try {
    result = await deps.httpGet(`${url}/api/tags`, {
      timeoutMs: TEST_TIMEOUT_MS,
      maxBodyBytes: PREVIEW_BYTES,
    });
  } catch (err) {
    deps.stdout(`ERROR: ${describeError(err)}`);
    return 1;
  }

  if (result.status < 200 || result.status >= 300) {
    deps.stdout(`ERROR: HTTP ${result.status}`);
    return 1;
  }

  deps.stdout(result.truncated ? `${result.body} ...` : result.body);
  return 0;
}
