/**
 * Base interface for all starsift events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Identifier of the CLI invocation */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/**
 * Emitted when a search over a user's stars starts.
 */
export interface SearchStarted extends BaseEvent {
  type: 'SearchStarted';
  payload: {
    user: string;
    query: string;
    limit: number;
  };
}

/** Emitted once the starred-set probe produced a fingerprint */
export interface FingerprintDerived extends BaseEvent {
  type: 'FingerprintDerived';
  payload: {
    user: string;
    /** Hex encoded SHA-256 digest */
    fingerprint: string;
  };
}

/** Emitted after the cache file was located and read */
export interface CacheResolved extends BaseEvent {
  type: 'CacheResolved';
  payload: {
    path: string;
    hit: boolean;
    bytes: number;
  };
}

/** Emitted when the dataset provider delivered the full starred listing */
export interface DatasetFetched extends BaseEvent {
  type: 'DatasetFetched';
  payload: {
    user: string;
    bytes: number;
    durationMs: number;
  };
}

/** Emitted when a freshly fetched dataset replaced the cache file */
export interface CacheWritten extends BaseEvent {
  type: 'CacheWritten';
  payload: {
    path: string;
    bytes: number;
  };
}

/** Emitted when scoring and extraction are done */
export interface SearchFinished extends BaseEvent {
  type: 'SearchFinished';
  payload: {
    totalMatches: number;
    returned: number;
    durationMs: number;
  };
}

export type StarsiftEvent =
  | SearchStarted
  | FingerprintDerived
  | CacheResolved
  | DatasetFetched
  | CacheWritten
  | SearchFinished;
