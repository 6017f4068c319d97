import type { StarredDatasetProvider } from './types';

/**
 * Serves a fixed payload. Used by tests and for searching a saved listing
 * without touching GitHub.
 */
export class StaticDatasetProvider implements StarredDatasetProvider {
  readonly requests: string[] = [];
  private readonly payload: Buffer;

  constructor(payload: Buffer | string) {
    this.payload = Buffer.from(payload);
  }

  async fetchStarred(user: string): Promise<Buffer> {
    this.requests.push(user);
    return Buffer.from(this.payload);
  }
}
