/**
 * Readiness prober: wait for a just-started service to answer on one of
 * several candidate URLs.
 *
 * Rounds run at a fixed cadence of `pollIntervalMs` measured from the start
 * of each round, so probe latency does not stretch the interval. Within a
 * round candidates are probed sequentially in priority order and the first
 * 2xx ends the call: a later candidate never wins over an earlier one that
 * is also up.
 *
 * There is no backoff: the loop is the retry mechanism, bounded by the
 * deadline. Probes never start at or after the deadline and each probe's
 * timeout is clipped to the time remaining.
 */

import { createLogger, type Logger } from '../logger.js';
import { ConfigurationError, ReadinessTimeoutError, type CandidateAttempt } from './errors.js';
import { DEFAULT_MAX_BODY_BYTES, probeEndpoint } from './http-probe.js';
import type { ContentSignature, ProbeFn, ReadinessOptions, ReadyResult } from './types.js';

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_POLL_INTERVAL_MS = 1_000;

/** Ceiling for the default per-probe timeout. */
export const MAX_DEFAULT_PROBE_TIMEOUT_MS = 3_000;

// ---------------------------------------------------------------------------
// Dependencies
// ---------------------------------------------------------------------------

/** Injectable collaborators; production defaults are used when omitted. */
export interface ProberDeps {
  probe?: ProbeFn;
  /** Monotonic-enough clock in milliseconds. */
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

// ---------------------------------------------------------------------------
// Option validation
// ---------------------------------------------------------------------------

/** {@link ReadinessOptions} with every default applied. */
export interface ResolvedReadinessOptions {
  candidates: readonly string[];
  totalTimeoutMs: number;
  pollIntervalMs: number;
  probeTimeoutMs: number;
  expectedSignature?: ContentSignature;
  maxBodyBytes: number;
}

function isPositive(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

/**
 * Validate options and apply defaults.
 *
 * @throws ConfigurationError on any invalid option. No I/O happens here.
 */
export function resolveReadinessOptions(options: ReadinessOptions): ResolvedReadinessOptions {
  if (!isPositive(options.totalTimeoutMs)) {
    throw new ConfigurationError(
      `totalTimeoutMs must be a positive number, got ${options.totalTimeoutMs}`,
      'totalTimeoutMs',
    );
  }

  if (options.candidates.length === 0) {
    throw new ConfigurationError('At least one candidate URL is required', 'candidates');
  }
  for (const candidate of options.candidates) {
    let parsed: URL;
    try {
      parsed = new URL(candidate);
    } catch {
      throw new ConfigurationError(`Invalid candidate URL: "${candidate}"`, 'candidates');
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new ConfigurationError(
        `Candidate URL must use http or https: "${candidate}"`,
        'candidates',
      );
    }
  }

  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  if (!isPositive(pollIntervalMs)) {
    throw new ConfigurationError(
      `pollIntervalMs must be a positive number, got ${pollIntervalMs}`,
      'pollIntervalMs',
    );
  }

  let probeTimeoutMs: number;
  if (options.probeTimeoutMs === undefined) {
    // Always strictly below the poll interval, even for sub-2ms intervals
    probeTimeoutMs = Math.min(
      MAX_DEFAULT_PROBE_TIMEOUT_MS,
      pollIntervalMs > 2 ? pollIntervalMs - 1 : pollIntervalMs / 2,
    );
  } else {
    probeTimeoutMs = options.probeTimeoutMs;
    if (!isPositive(probeTimeoutMs) || probeTimeoutMs >= pollIntervalMs) {
      throw new ConfigurationError(
        `probeTimeoutMs must be positive and below pollIntervalMs (${pollIntervalMs}), got ${probeTimeoutMs}`,
        'probeTimeoutMs',
      );
    }
  }

  const maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
  if (!Number.isInteger(maxBodyBytes) || maxBodyBytes < 1) {
    throw new ConfigurationError(
      `maxBodyBytes must be a positive integer, got ${maxBodyBytes}`,
      'maxBodyBytes',
    );
  }

  if (options.expectedSignature === '') {
    throw new ConfigurationError('expectedSignature must not be empty', 'expectedSignature');
  }

  return {
    candidates: [...options.candidates],
    totalTimeoutMs: options.totalTimeoutMs,
    pollIntervalMs,
    probeTimeoutMs,
    expectedSignature: options.expectedSignature,
    maxBodyBytes,
  };
}

// ---------------------------------------------------------------------------
// awaitReady()
// ---------------------------------------------------------------------------

/**
 * Poll the candidates until one answers 2xx or the deadline passes.
 *
 * A signature mismatch still counts as ready (`'reachable-unverified'`).
 *
 * @throws ConfigurationError before any request when options are invalid.
 * @throws ReadinessTimeoutError with every candidate's last failure reason.
 */
export async function awaitReady(
  options: ReadinessOptions,
  deps: ProberDeps = {},
): Promise<ReadyResult> {
  const resolved = resolveReadinessOptions(options);
  const probe = deps.probe ?? probeEndpoint;
  const now = deps.now ?? Date.now;
  const sleep = deps.sleep ?? defaultSleep;
  const logger = deps.logger ?? createLogger('readiness');

  const { candidates, pollIntervalMs } = resolved;
  const start = now();
  const deadline = start + resolved.totalTimeoutMs;
  const reasons: string[] = candidates.map(() => 'not probed');
  let rounds = 0;

  while (now() < deadline) {
    rounds++;
    const roundStart = now();

    for (const [index, url] of candidates.entries()) {
      const remaining = deadline - now();
      if (remaining <= 0) break;

      const result = await probe(url, {
        timeoutMs: Math.min(resolved.probeTimeoutMs, remaining),
        signature: resolved.expectedSignature,
        maxBodyBytes: resolved.maxBodyBytes,
      });

      if (result.outcome !== 'unreachable') {
        const elapsedMs = now() - start;
        logger.info('endpoint ready', {
          url,
          round: rounds,
          duration_ms: elapsedMs,
          ok: true,
          outcome: result.outcome,
        });
        return { url, outcome: result.outcome, status: result.status, rounds, elapsedMs };
      }

      reasons[index] = result.reason;
      logger.debug('candidate unreachable', { url, round: rounds, reason: result.reason });
    }

    const nextTick = Math.min(roundStart + pollIntervalMs, deadline);
    const wait = nextTick - now();
    if (wait > 0) {
      await sleep(wait);
    }
  }

  const elapsedMs = now() - start;
  const attempts: CandidateAttempt[] = candidates.map((url, index) => ({
    url,
    reason: reasons[index] ?? 'not probed',
  }));
  logger.warn('readiness timed out', {
    duration_ms: elapsedMs,
    ok: false,
    error_code: 'READINESS_TIMEOUT',
    rounds,
  });
  throw new ReadinessTimeoutError({
    attempts,
    elapsedMs,
    rounds,
    timeoutMs: resolved.totalTimeoutMs,
  });
}
