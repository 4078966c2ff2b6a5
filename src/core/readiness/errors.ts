/**
 * Error classes raised by the readiness prober.
 *
 * `ConfigurationError` is thrown before any network I/O when the options
 * are invalid. `ReadinessTimeoutError` is terminal: it carries every
 * candidate with its last failure reason so the caller can print an
 * itemized diagnostic instead of a bare failure.
 */

// ---------------------------------------------------------------------------
// Brand symbols (module-private, not exported)
// ---------------------------------------------------------------------------

const CONFIGURATION_ERROR_BRAND = Symbol.for('webui-launch.ConfigurationError');
const READINESS_TIMEOUT_BRAND = Symbol.for('webui-launch.ReadinessTimeoutError');

// ---------------------------------------------------------------------------
// ConfigurationError
// ---------------------------------------------------------------------------

export class ConfigurationError extends Error {
  readonly code = 'CONFIGURATION' as const;
  /** Which option or config key was rejected. */
  readonly field?: string;

  /** @internal */
  readonly [CONFIGURATION_ERROR_BRAND] = true as const;

  constructor(message: string, field?: string) {
    super(message);
    this.name = 'ConfigurationError';
    if (field !== undefined) {
      this.field = field;
    }
  }
}

export function isConfigurationError(err: unknown): err is ConfigurationError {
  return (
    typeof err === 'object' &&
    err !== null &&
    CONFIGURATION_ERROR_BRAND in err &&
    err[CONFIGURATION_ERROR_BRAND] === true
  );
}

// ---------------------------------------------------------------------------
// ReadinessTimeoutError
// ---------------------------------------------------------------------------

/** Last observed failure for one candidate. */
export interface CandidateAttempt {
  url: string;
  /** Why the most recent probe failed, or `'not probed'`. */
  reason: string;
}

export interface ReadinessTimeoutDetails {
  attempts: CandidateAttempt[];
  elapsedMs: number;
  rounds: number;
  timeoutMs: number;
}

export class ReadinessTimeoutError extends Error {
  readonly code = 'READINESS_TIMEOUT' as const;
  readonly attempts: readonly CandidateAttempt[];
  readonly elapsedMs: number;
  readonly rounds: number;
  readonly timeoutMs: number;

  /** @internal */
  readonly [READINESS_TIMEOUT_BRAND] = true as const;

  constructor(details: ReadinessTimeoutDetails) {
    const urls = details.attempts.map((a) => a.url).join(', ');
    super(
      `No endpoint became ready within ${details.timeoutMs}ms ` +
        `(${details.rounds} rounds, ${details.elapsedMs}ms elapsed): ${urls}`,
    );
    this.name = 'ReadinessTimeoutError';
    this.attempts = details.attempts;
    this.elapsedMs = details.elapsedMs;
    this.rounds = details.rounds;
    this.timeoutMs = details.timeoutMs;
  }

  /**
   * Operator-facing report, one line per candidate.
   *
   * ```
   * Service not ready after 5.0s (5 rounds). Tried:
   *   - http://127.0.0.1:3000/ (connection refused)
   * ```
   */
  report(): string {
    const seconds = (this.elapsedMs / 1000).toFixed(1);
    const lines = [`Service not ready after ${seconds}s (${this.rounds} rounds). Tried:`];
    for (const attempt of this.attempts) {
      lines.push(`  - ${attempt.url} (${attempt.reason})`);
    }
    return lines.join('\n');
  }
}

export function isReadinessTimeoutError(err: unknown): err is ReadinessTimeoutError {
  return (
    typeof err === 'object' &&
    err !== null &&
    READINESS_TIMEOUT_BRAND in err &&
    err[READINESS_TIMEOUT_BRAND] === true
  );
}
