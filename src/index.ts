/**
 * Public entry for using the readiness prober and launcher pieces as a
 * library.
 */

export const VERSION = '0.1.0';

export * from './core/readiness/index.js';

export {
  AppleContainerRuntime,
  type AppleContainerRuntimeOptions,
} from './core/container/apple-container-runtime.js';
export type {
  ContainerRuntime,
  ContainerRunOptions,
  ExecFn,
  PortMapping,
  StreamFn,
  VolumeMount,
} from './core/container/runtime.js';

export { loadConfig } from './core/config-loader.js';
export type { LauncherConfig } from './types/config.js';
export { configureLogging, createLogger, type Logger, type LogLevel } from './core/logger.js';
