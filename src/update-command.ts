/**
 * `webui-launch update`.
 *
 * Pulls the configured image and recreates the container only when the
 * pulled digest differs from the one the running container was created
 * from. Old images are pruned after a recreate.
 */

import { containerImageDigest, imageDigest, isUpToDate } from './core/image-digest.js';
import { createLogger } from './core/logger.js';
import { runContainer, type RunDeps, type RunFlags } from './run-command.js';
import type { LauncherConfig } from './types/config.js';

const logger = createLogger('update');

async function readDigest(
  read: () => Promise<unknown>,
  extract: (raw: unknown) => string,
): Promise<string> {
  try {
    return extract(await read());
  } catch (err) {
    logger.debug('digest lookup failed', { error: err });
    return '';
  }
}

/** @returns Process exit code. */
export async function runUpdate(
  config: LauncherConfig,
  deps: RunDeps,
  flags: RunFlags = { wait: true },
): Promise<number> {
  const { image, name } = config.container;

  deps.stdout(`Pulling: ${image}`);
  try {
    await deps.runtime.pullImage(image);
  } catch (err) {
    deps.stderr(`Image pull failed: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }

  const remote = await readDigest(() => deps.runtime.inspectImage(image), imageDigest);
  const current = await readDigest(() => deps.runtime.inspectContainer(name), containerImageDigest);

  if (isUpToDate(current, remote)) {
    deps.stdout(`Open-WebUI is up to date (${remote})`);
    return 0;
  }

  deps.stdout(`Updating container to ${remote || image}`);
  const code = await runContainer(config, deps, flags);
  if (code !== 0) {
    return code;
  }

  deps.stdout('Pruning old images...');
  try {
    await deps.runtime.pruneImages();
  } catch (err) {
    logger.warn('image prune failed', { error: err });
  }
  return 0;
}
