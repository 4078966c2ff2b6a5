/**
 * Single bounded HTTP GET, used for readiness probes and the Ollama
 * connectivity test.
 *
 * Uses Node.js built-in `node:http` / `node:https` with `agent: false`, so
 * every request opens its own connection and nothing is pooled. The timer
 * bounds the whole exchange (connect, headers and body), unlike
 * `req.setTimeout` which only fires on socket inactivity. The request is
 * destroyed on every exit path.
 */

import * as http from 'node:http';
import * as https from 'node:https';
import { StringDecoder } from 'node:string_decoder';
import type { ContentSignature, ProbeFn } from './types.js';

/** Default upper bound on body bytes read: 64 KiB. */
export const DEFAULT_MAX_BODY_BYTES = 64 * 1024;

// ---------------------------------------------------------------------------
// httpGet()
// ---------------------------------------------------------------------------

export interface HttpGetOptions {
  timeoutMs: number;
  /** Stop reading after this many bytes (default {@link DEFAULT_MAX_BODY_BYTES}). */
  maxBodyBytes?: number;
  /** When false the body is discarded and `body` is `''` (default true). */
  readBody?: boolean;
}

export interface HttpGetResult {
  status: number;
  body: string;
  /**
   * True when the body is only a prefix: cut at `maxBodyBytes`, or cut
   * short by the timeout or a connection error after the headers arrived.
   */
  truncated: boolean;
}

/**
 * Issue one GET and resolve with the status and (a prefix of) the body.
 *
 * Any status resolves. Transport failures and the timeout reject only while
 * no response headers have arrived; after that they end the body early and
 * the partial body resolves with `truncated: true`.
 */
export async function httpGet(url: string, options: HttpGetOptions): Promise<HttpGetResult> {
  const target = new URL(url);
  if (target.protocol !== 'http:' && target.protocol !== 'https:') {
    throw new Error(`Unsupported protocol: ${target.protocol}`);
  }
  const transport = target.protocol === 'https:' ? https : http;
  const maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
  const readBody = options.readBody ?? true;

  return new Promise<HttpGetResult>((resolve, reject) => {
    let settled = false;
    let status: number | undefined;
    const chunks: Buffer[] = [];
    let received = 0;

    const req = transport.request(
      target,
      { method: 'GET', agent: false, headers: { Accept: '*/*' } },
      (res) => {
        const code = res.statusCode ?? 0;
        status = code;
        res.on('error', fail);
        res.on('close', () => {
          if (!res.complete) fail(new Error('aborted'));
        });

        if (!readBody) {
          finish({ status: code, body: '', truncated: false });
          return;
        }

        res.on('data', (chunk: Buffer) => {
          if (settled) return;
          if (received + chunk.length > maxBodyBytes) {
            chunks.push(chunk.subarray(0, maxBodyBytes - received));
            finishPartial();
            return;
          }
          chunks.push(chunk);
          received += chunk.length;
        });
        res.on('end', () => {
          finish({ status: code, body: Buffer.concat(chunks).toString('utf-8'), truncated: false });
        });
      },
    );

    const timer = setTimeout(() => {
      fail(new Error(`timed out after ${options.timeoutMs}ms`));
    }, options.timeoutMs);

    req.on('error', fail);
    req.end();

    function finish(result: HttpGetResult): void {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      req.destroy();
      resolve(result);
    }

    function finishPartial(): void {
      finish({ status: status ?? 0, body: decodePrefix(Buffer.concat(chunks)), truncated: true });
    }

    function fail(err: Error): void {
      if (status !== undefined) {
        finishPartial();
        return;
      }
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      req.destroy();
      reject(err);
    }
  });
}

/** Decode a UTF-8 prefix, dropping a character split at the end. */
function decodePrefix(bytes: Buffer): string {
  return new StringDecoder('utf8').write(bytes);
}

// ---------------------------------------------------------------------------
// Signature matching
// ---------------------------------------------------------------------------

/** Case-insensitive substring match for strings; `RegExp` signatures match as given. */
export function matchesSignature(body: string, signature: ContentSignature): boolean {
  if (typeof signature === 'string') {
    return body.toLowerCase().includes(signature.toLowerCase());
  }
  // search() ignores the global flag and lastIndex
  return body.search(signature) !== -1;
}

// ---------------------------------------------------------------------------
// probeEndpoint()
// ---------------------------------------------------------------------------

/**
 * Probe one URL once and classify the result. Never throws: every failure
 * becomes an `'unreachable'` result with a reason.
 */
export const probeEndpoint: ProbeFn = async (url, options) => {
  const { signature } = options;
  let result: HttpGetResult;
  try {
    result = await httpGet(url, {
      timeoutMs: options.timeoutMs,
      maxBodyBytes: options.maxBodyBytes,
      readBody: signature !== undefined,
    });
  } catch (err) {
    return { url, outcome: 'unreachable', reason: describeError(err) };
  }

  const { status } = result;
  if (status < 200 || status >= 300) {
    return { url, outcome: 'unreachable', status, reason: `HTTP ${status}` };
  }

  if (signature !== undefined && matchesSignature(result.body, signature)) {
    return { url, outcome: 'reachable-verified', status };
  }
  return { url, outcome: 'reachable-unverified', status };
};

/** Short, single-line reason for a transport failure. */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    const firstLine = err.message.split('\n')[0];
    if (firstLine) return firstLine;
    // AggregateError from dual-stack connects carries an empty message
    return 'code' in err && typeof err.code === 'string' ? err.code : err.name;
  }
  return String(err);
}
