import {
  ValidationError,
  type Config,
  type Logger,
  type StarsiftEvent,
} from '@starsift/shared';
import { load, resolvePath, store } from '../cache/store';
import { deriveFingerprint, fingerprintHex } from '../fingerprint/fingerprint';
import type { StarredDatasetProvider } from '../provider/types';
import { takeTop } from '../queue/resultQueue';
import { search } from '../search/engine';
import type { Match } from '../search/types';

export interface StarSearchContext {
  config: Config;
  logger: Logger;
  provider: StarredDatasetProvider;
  fetchImpl?: typeof fetch;
  runId?: string;
}

export interface StarSearchRequest {
  user: string;
  query: string;
  /** Defaults to `config.search.limit`; negative means all matches */
  limit?: number;
  /** Overrides `config.cache.file` */
  cacheFile?: string;
}

export interface StarSearchResult {
  user: string;
  /** Hex encoded fingerprint of the starred set */
  fingerprint: string;
  cachePath: string;
  cacheHit: boolean;
  totalMatches: number;
  matches: Match[];
}

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

type EventInit = DistributiveOmit<StarsiftEvent, 'schemaVersion' | 'timestamp' | 'runId'>;

/**
 * Answers a query against a user's starred repositories, refreshing the
 * cached listing only when the starred set's fingerprint points at an empty
 * cache file. Errors propagate to the caller untouched.
 */
export async function searchStarred(
  ctx: StarSearchContext,
  request: StarSearchRequest,
): Promise<StarSearchResult> {
  const { config, provider } = ctx;
  const user = request.user.trim();
  if (user === '') {
    throw new ValidationError('user cannot be empty');
  }

  const runId = ctx.runId || Date.now().toString();
  const logger = ctx.logger.child({ user });
  const limit = request.limit ?? config.search.limit;
  const startedAt = Date.now();

  const emit = async (event: EventInit) => {
    const stamped: StarsiftEvent = {
      ...event,
      schemaVersion: 1,
      timestamp: new Date().toISOString(),
      runId,
    };
    await logger.log(stamped);
  };

  await emit({ type: 'SearchStarted', payload: { user, query: request.query, limit } });

  const fingerprint = await deriveFingerprint(user, {
    github: config.github,
    fetchImpl: ctx.fetchImpl,
    logger,
  });
  await emit({
    type: 'FingerprintDerived',
    payload: { user, fingerprint: fingerprintHex(fingerprint) },
  });

  const cachePath = resolvePath(fingerprint, request.cacheFile || config.cache.file, {
    dir: config.cache.dir,
    prefix: config.cache.prefix,
  });
  let dataset = await load(cachePath);
  const cacheHit = dataset.length > 0;
  await emit({
    type: 'CacheResolved',
    payload: { path: cachePath, hit: cacheHit, bytes: dataset.length },
  });

  if (!cacheHit) {
    logger.debug('Cache file is empty, fetching stars');
    const fetchStart = Date.now();
    dataset = await provider.fetchStarred(user);
    await emit({
      type: 'DatasetFetched',
      payload: { user, bytes: dataset.length, durationMs: Date.now() - fetchStart },
    });

    await store(cachePath, dataset);
    await emit({ type: 'CacheWritten', payload: { path: cachePath, bytes: dataset.length } });
  } else {
    logger.debug(`Using cached stars from ${cachePath}`);
  }

  const queue = search(dataset, request.query, { maxDistance: config.search.maxDistance });
  const totalMatches = queue.length;
  const matches = takeTop(queue, limit);

  await emit({
    type: 'SearchFinished',
    payload: { totalMatches, returned: matches.length, durationMs: Date.now() - startedAt },
  });

  return {
    user,
    fingerprint: fingerprintHex(fingerprint),
    cachePath,
    cacheHit,
    totalMatches,
    matches,
  };
}
