export const name = '@starsift/core';

export * from './fingerprint/fingerprint';
export * from './cache/store';
export * from './provider/types';
export * from './provider/ghCli';
export * from './provider/static';
export * from './queue/resultQueue';
export * from './search/types';
export * from './search/dataset';
export * from './search/scoring';
export * from './search/engine';
export * from './config/loader';
export * from './pipeline/searchStarred';
