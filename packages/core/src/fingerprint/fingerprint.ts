import { createHash } from 'node:crypto';
import {
  NetworkError,
  NotFoundError,
  RateLimitError,
  UnexpectedStatusError,
  ValidationError,
  type GitHubConfig,
  type Logger,
} from '@starsift/shared';

/** SHA-256 digest of the starred listing's pagination header. Always 32 bytes. */
export type Fingerprint = Buffer;

export const FINGERPRINT_BYTES = 32;

export interface DeriveFingerprintOptions {
  github: GitHubConfig;
  fetchImpl?: typeof fetch;
  logger?: Logger;
}

function resolveFetch(fetchImpl?: typeof fetch): typeof fetch {
  if (fetchImpl) {
    return fetchImpl;
  }
  if (typeof globalThis.fetch === 'function') {
    return globalThis.fetch.bind(globalThis);
  }
  throw new NetworkError('Fetch API is not available in this environment');
}

export function probeUrl(apiBaseUrl: string, user: string): string {
  const base = apiBaseUrl.replace(/\/+$/, '');
  return `${base}/users/${encodeURIComponent(user)}/starred?page=1&per_page=1`;
}

export function digestLinkHeader(link: string): Fingerprint {
  return createHash('sha256').update(link, 'utf8').digest();
}

export function fingerprintHex(fingerprint: Fingerprint): string {
  return fingerprint.toString('hex');
}

export function isZeroFingerprint(fingerprint: Fingerprint): boolean {
  return fingerprint.length === 0 || fingerprint.every((byte) => byte === 0);
}

/**
 * Fingerprints a user's starred set with a single one-item request.
 *
 * With `per_page=1` the `Link` header's `rel="last"` page number equals the
 * number of starred repositories, so the header text changes whenever the
 * count does. Starring one repository and unstarring another leaves the
 * header, and therefore the fingerprint, unchanged.
 */
export async function deriveFingerprint(
  user: string,
  options: DeriveFingerprintOptions,
): Promise<Fingerprint> {
  if (user.trim() === '') {
    throw new ValidationError('user cannot be empty');
  }

  const fetchImpl = resolveFetch(options.fetchImpl);
  const url = probeUrl(options.github.apiBaseUrl, user);
  options.logger?.debug(`Probing starred repositories for ${user}: ${url}`);

  let response: Response;
  try {
    response = await fetchImpl(url, {
      method: 'GET',
      headers: {
        Accept: 'application/vnd.github+json',
        'Cache-Control': 'no-cache',
        'User-Agent': 'starsift',
        'X-GitHub-Api-Version': options.github.apiVersion,
      },
    });
  } catch (e) {
    throw new NetworkError(
      `Starred probe for ${user} failed: ${e instanceof Error ? e.message : String(e)}`,
      { cause: e, details: { url } },
    );
  }

  // Only the headers matter.
  await response.body?.cancel();

  switch (response.status) {
    case 200:
      break;
    case 403:
      throw new RateLimitError('API rate limit reached', {
        used: response.headers.get('x-ratelimit-used') ?? undefined,
        remaining: response.headers.get('x-ratelimit-remaining') ?? undefined,
        reset: response.headers.get('x-ratelimit-reset') ?? undefined,
      });
    case 404:
      throw new NotFoundError(
        `User ${user} not found or you're not authorized to access this data`,
        { details: { url } },
      );
    default:
      throw new UnexpectedStatusError(response.status, { details: { url } });
  }

  const fingerprint = digestLinkHeader(response.headers.get('link') ?? '');
  options.logger?.debug(`Fingerprint generated: ${fingerprintHex(fingerprint)}`);
  return fingerprint;
}
