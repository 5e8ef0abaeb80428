import fetch from 'node-fetch';
import { z } from 'zod';
import { logger } from '../shared/logger.js';
import { ChainClientError } from '../shared/errors.js';
import { type Result, Ok, Err, toError } from '../shared/result.js';
import { parseStateSnapshot } from './snapshot-schema.js';
import type { StateLocker } from './state-locker.js';

export type StateRefresherConfig = {
  sourceUrl: string;
  refreshIntervalMs: number;
  timeoutMs: number;
};

export const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timeout);
      resolve();
    };
    const timeout = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

export const createStateRefresher = (config: StateRefresherConfig, locker: StateLocker) => {
  let abortController: AbortController | null = null;

  const refresh = async (): Promise<Result<bigint, ChainClientError>> => {
    let body: unknown;
    try {
      const response = await fetch(config.sourceUrl, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(config.timeoutMs),
      });
      if (!response.ok) {
        const errorBody = await response.text();
        return Err(new ChainClientError(`State provider responded with status ${response.status}: ${errorBody}`, 'state'));
      }
      body = await response.json();
    } catch (error) {
      return Err(new ChainClientError(`State provider request failed: ${toError(error).message}`, 'state', { cause: error }));
    }

    try {
      const { snapshot, totalEffectiveRplStake } = parseStateSnapshot(body);
      locker.update(snapshot, totalEffectiveRplStake);
      logger.debug(`[StateRefresher] Published snapshot at block ${snapshot.elBlockNumber}`);
      return Ok(snapshot.elBlockNumber);
    } catch (error) {
      const detail = error instanceof z.ZodError ? JSON.stringify(error.issues) : toError(error).message;
      return Err(new ChainClientError(`State document failed validation: ${detail}`, 'state', { cause: error }));
    }
  };

  const loop = async (signal: AbortSignal) => {
    while (!signal.aborted) {
      const result = await refresh();
      if (!result.ok) {
        // The previous snapshot stays published.
        logger.warn(`[StateRefresher] ${result.error.message}`);
      }
      await sleep(config.refreshIntervalMs, signal);
    }
  };

  const start = () => {
    if (abortController) return;
    abortController = new AbortController();
    loop(abortController.signal).catch((error) => {
      logger.error('[StateRefresher] Unhandled error in refresh loop:', error);
    });
    logger.info(`[StateRefresher] Polling ${config.sourceUrl} every ${config.refreshIntervalMs}ms`);
  };

  const stop = () => {
    if (!abortController) return;
    logger.info('[StateRefresher] Stopping...');
    abortController.abort();
    abortController = null;
  };

  return { refresh, start, stop };
};

export type StateRefresher = ReturnType<typeof createStateRefresher>;
