import { rm, writeFile } from 'node:fs/promises';
import { createLogger, errMessage } from './logger';

const logger = createLogger({ name: 'healthcheck' });

const DEFAULT_PATH = '/tmp/.relaycord-bot-healthy';

export async function touchHealthFile(path: string = DEFAULT_PATH): Promise<void> {
  await writeFile(path, new Date().toISOString(), 'utf-8');
}

export interface HealthBeatOptions {
  intervalMs?: number;
  path?: string;
  /** The file is only refreshed while this returns true. */
  isHealthy?: () => boolean;
}

/**
 * Periodically refreshes a liveness file for container healthchecks. While
 * unhealthy the file is removed so a stale timestamp never reads as alive.
 */
export function startHealthBeat(opts: HealthBeatOptions = {}): { stop: () => void } {
  const intervalMs = opts.intervalMs ?? 5000;
  const path = opts.path ?? DEFAULT_PATH;
  const isHealthy = opts.isHealthy ?? (() => true);

  const tick = () => {
    const op = isHealthy() ? touchHealthFile(path) : rm(path, { force: true });
    op.catch((err) => {
      logger.warn({ path, err: errMessage(err) }, 'Health file update failed');
    });
  };
  tick();
  const timer = setInterval(tick, intervalMs);
  return {
    stop: () => clearInterval(timer),
  };
}
