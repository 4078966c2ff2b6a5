export {
  awaitReady,
  resolveReadinessOptions,
  DEFAULT_POLL_INTERVAL_MS,
  MAX_DEFAULT_PROBE_TIMEOUT_MS,
  type ProberDeps,
  type ResolvedReadinessOptions,
} from './prober.js';

export {
  httpGet,
  probeEndpoint,
  matchesSignature,
  describeError,
  DEFAULT_MAX_BODY_BYTES,
  type HttpGetOptions,
  type HttpGetResult,
} from './http-probe.js';

export {
  ConfigurationError,
  ReadinessTimeoutError,
  isConfigurationError,
  isReadinessTimeoutError,
  type CandidateAttempt,
  type ReadinessTimeoutDetails,
} from './errors.js';

export type {
  ProbeOutcome,
  ContentSignature,
  ReachableProbe,
  UnreachableProbe,
  ProbeResult,
  ProbeOptions,
  ProbeFn,
  ReadinessOptions,
  ReadyResult,
} from './types.js';
