import os from 'node:os';
import path from 'node:path';
import { promises as fs } from 'node:fs';
import { ensureFile } from 'fs-extra';
import {
  DEFAULT_CACHE_PREFIX,
  IOError,
  ValidationError,
  atomicWrite,
} from '@starsift/shared';
import { isZeroFingerprint, type Fingerprint } from '../fingerprint/fingerprint';

/** Bytes of the fingerprint encoded into a derived cache file name. */
export const CACHE_KEY_BYTES = 6;

export interface ResolvePathOptions {
  /** Scratch directory for derived paths; the OS temp dir when unset */
  dir?: string;
  prefix?: string;
}

function errorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

function reason(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Cache file for a fingerprint, e.g. `<tmpdir>/stars_2d06a89b2687.json`.
 * A non-empty `overridePath` always wins and is returned untouched.
 */
export function resolvePath(
  fingerprint: Fingerprint,
  overridePath: string | undefined,
  options: ResolvePathOptions = {},
): string {
  if (overridePath) {
    return overridePath;
  }
  if (isZeroFingerprint(fingerprint)) {
    throw new ValidationError('fingerprint cannot be empty when no cache file is given');
  }

  const key = fingerprint.subarray(0, CACHE_KEY_BYTES).toString('hex');
  const prefix = options.prefix ?? DEFAULT_CACHE_PREFIX;
  return path.join(options.dir ?? os.tmpdir(), `${prefix}${key}.json`);
}

/**
 * Reads the whole cache file. A file that does not exist yet is created empty
 * and reported as zero bytes, the same as an empty file.
 */
export async function load(filePath: string): Promise<Buffer> {
  try {
    return await fs.readFile(filePath);
  } catch (e) {
    if (errorCode(e) !== 'ENOENT') {
      throw new IOError(filePath, `Cannot read cache file ${filePath}: ${reason(e)}`, {
        cause: e,
      });
    }
  }

  try {
    await ensureFile(filePath);
  } catch (e) {
    throw new IOError(filePath, `Cannot create cache file ${filePath}: ${reason(e)}`, {
      cause: e,
    });
  }
  return Buffer.alloc(0);
}

/**
 * Replaces the cache file with `bytes`. The previous content is never merged.
 */
export async function store(filePath: string, bytes: Buffer): Promise<void> {
  try {
    await atomicWrite(filePath, bytes);
  } catch (e) {
    throw new IOError(filePath, `Cannot write cache file ${filePath}: ${reason(e)}`, {
      cause: e,
    });
  }
}
