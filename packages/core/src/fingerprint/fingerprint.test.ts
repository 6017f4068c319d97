import { describe, it, expect } from 'vitest';
import { createHash } from 'node:crypto';
import {
  NetworkError,
  NotFoundError,
  RateLimitError,
  UnexpectedStatusError,
  ValidationError,
} from '@starsift/shared';
import { testConfig } from '../__fixtures__/test-config';
import {
  FINGERPRINT_BYTES,
  deriveFingerprint,
  fingerprintHex,
  isZeroFingerprint,
  probeUrl,
} from './fingerprint';

const LINK =
  '<https://api.github.com/user/12345/starred?page=2&per_page=1>; rel="next", ' +
  '<https://api.github.com/user/12345/starred?page=843&per_page=1>; rel="last"';

interface RecordedCall {
  url: string;
  init?: RequestInit;
}

function stubFetch(status: number, headers: Record<string, string> = {}) {
  const calls: RecordedCall[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    calls.push({ url: String(input), init });
    return new Response('OK', { status, headers });
  };
  return { fetchImpl, calls };
}

const github = testConfig().github;

describe('deriveFingerprint', () => {
  it('probes page 1 with one item per page', async () => {
    const { fetchImpl, calls } = stubFetch(200, { Link: LINK });

    await deriveFingerprint('octocat', { github, fetchImpl });

    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe('https://api.github.com/users/octocat/starred?page=1&per_page=1');
    expect(calls[0].init?.method).toBe('GET');
    expect(calls[0].init?.headers).toMatchObject({
      Accept: 'application/vnd.github+json',
      'Cache-Control': 'no-cache',
      'X-GitHub-Api-Version': '2022-11-28',
    });
  });

  it('digests the raw Link header of a 200 response', async () => {
    const { fetchImpl } = stubFetch(200, { Link: LINK });

    const fingerprint = await deriveFingerprint('octocat', { github, fetchImpl });

    expect(fingerprint).toHaveLength(FINGERPRINT_BYTES);
    expect(fingerprintHex(fingerprint)).toBe(
      '2d06a89b2687745713ef0f025b8fff17873b870e7304300a982286816e471e6e',
    );
    expect(fingerprintHex(fingerprint)).toBe(createHash('sha256').update(LINK).digest('hex'));
  });

  it('is a pure function of the header text', async () => {
    const first = await deriveFingerprint('a', { github, fetchImpl: stubFetch(200, { Link: LINK }).fetchImpl });
    const second = await deriveFingerprint('b', { github, fetchImpl: stubFetch(200, { Link: LINK }).fetchImpl });
    const grown = await deriveFingerprint('a', {
      github,
      fetchImpl: stubFetch(200, { Link: LINK.replace('page=843', 'page=844') }).fetchImpl,
    });

    expect(first.equals(second)).toBe(true);
    expect(first.equals(grown)).toBe(false);
  });

  it('digests an empty string when the Link header is missing', async () => {
    const { fetchImpl } = stubFetch(200);

    const fingerprint = await deriveFingerprint('octocat', { github, fetchImpl });

    expect(fingerprintHex(fingerprint)).toBe(
      'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855',
    );
  });

  it('maps 403 to a RateLimitError carrying the rate-limit headers', async () => {
    const { fetchImpl } = stubFetch(403, {
      'X-RateLimit-Used': '5000',
      'X-RateLimit-Remaining': '0',
      'X-RateLimit-Reset': '1630000000',
    });

    const error = await deriveFingerprint('octocat', { github, fetchImpl }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RateLimitError);
    expect(error).toMatchObject({ used: '5000', remaining: '0', reset: '1630000000' });
  });

  it('maps 404 to a NotFoundError', async () => {
    const { fetchImpl } = stubFetch(404);
    await expect(deriveFingerprint('nobody', { github, fetchImpl })).rejects.toBeInstanceOf(
      NotFoundError,
    );
  });

  it('maps any other status to an UnexpectedStatusError', async () => {
    const { fetchImpl } = stubFetch(500);

    const error = await deriveFingerprint('octocat', { github, fetchImpl }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UnexpectedStatusError);
    expect(error).toMatchObject({ status: 500 });
  });

  it('wraps transport failures in a NetworkError', async () => {
    const cause = new TypeError('fetch failed');
    const fetchImpl: typeof fetch = async () => {
      throw cause;
    };

    const error = await deriveFingerprint('octocat', { github, fetchImpl }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({ cause });
  });

  it('rejects an empty user before any request', async () => {
    const { fetchImpl, calls } = stubFetch(200);

    await expect(deriveFingerprint('', { github, fetchImpl })).rejects.toBeInstanceOf(
      ValidationError,
    );
    await expect(deriveFingerprint('  ', { github, fetchImpl })).rejects.toBeInstanceOf(
      ValidationError,
    );
    expect(calls).toHaveLength(0);
  });
});

describe('probeUrl', () => {
  it('trims trailing slashes and encodes the handle', () => {
    expect(probeUrl('https://ghe.example.test/api/v3/', 'a b')).toBe(
      'https://ghe.example.test/api/v3/users/a%20b/starred?page=1&per_page=1',
    );
  });
});

describe('isZeroFingerprint', () => {
  it('treats empty and all-zero digests as unset', () => {
    expect(isZeroFingerprint(Buffer.alloc(0))).toBe(true);
    expect(isZeroFingerprint(Buffer.alloc(32))).toBe(true);
    expect(isZeroFingerprint(Buffer.from([0, 0, 1]))).toBe(false);
  });
});
