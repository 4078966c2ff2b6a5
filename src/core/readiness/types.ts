/**
 * Types shared by the readiness prober and its HTTP probe.
 */

// ---------------------------------------------------------------------------
// Probe outcome
// ---------------------------------------------------------------------------

/**
 * Classification of a single probe.
 *
 * - `'unreachable'`: transport error, timeout, or non-2xx status.
 * - `'reachable-unverified'`: 2xx, but no signature requested or it did not match.
 * - `'reachable-verified'`: 2xx and the body matched the expected signature.
 */
export type ProbeOutcome = 'unreachable' | 'reachable-unverified' | 'reachable-verified';

/** Expected content in a ready service's body. Strings match case-insensitively. */
export type ContentSignature = string | RegExp;

/** A probe that got a 2xx. */
export interface ReachableProbe {
  url: string;
  outcome: Exclude<ProbeOutcome, 'unreachable'>;
  status: number;
}

/** A probe that failed at the transport level or got a non-2xx status. */
export interface UnreachableProbe {
  url: string;
  outcome: 'unreachable';
  /** HTTP status, when a response arrived. */
  status?: number;
  /** e.g. `'HTTP 502'`, `'connect ECONNREFUSED 127.0.0.1:3000'`. */
  reason: string;
}

/** Result of probing one candidate once. */
export type ProbeResult = ReachableProbe | UnreachableProbe;

/** Options for a single probe. */
export interface ProbeOptions {
  timeoutMs: number;
  signature?: ContentSignature;
  maxBodyBytes?: number;
}

/** Probes one URL once. Implementations must not throw. */
export type ProbeFn = (url: string, options: ProbeOptions) => Promise<ProbeResult>;

// ---------------------------------------------------------------------------
// awaitReady() options and result
// ---------------------------------------------------------------------------

/** Configuration for one {@link awaitReady} call. */
export interface ReadinessOptions {
  /** Candidate URLs in priority order. */
  candidates: readonly string[];
  /** Overall deadline, measured from the start of the call. */
  totalTimeoutMs: number;
  /** Cadence between the starts of consecutive rounds (default 1000). */
  pollIntervalMs?: number;
  /** Per-request bound; must be below `pollIntervalMs` (default `min(3000, pollIntervalMs - 1)`). */
  probeTimeoutMs?: number;
  /** Soft content check on the winning response body. */
  expectedSignature?: ContentSignature;
  /** Upper bound on body bytes read for the signature check (default 64 KiB). */
  maxBodyBytes?: number;
}

export interface ReadyResult extends ReachableProbe {
  /** 1-based round in which the winning probe succeeded. */
  rounds: number;
  elapsedMs: number;
}
