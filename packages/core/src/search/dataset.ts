import { ParseError } from '@starsift/shared';
import { DatasetSchema, type Repository } from './types';

/**
 * Decodes cached or freshly fetched bytes into repositories.
 * Any malformed record rejects the whole payload.
 */
export function parseDataset(payload: Buffer | string): Repository[] {
  const text = typeof payload === 'string' ? payload : payload.toString('utf8');

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new ParseError(
      `Starred dataset is not valid JSON: ${e instanceof Error ? e.message : String(e)}`,
      { cause: e },
    );
  }

  if (!Array.isArray(raw)) {
    throw new ParseError('Starred dataset must be a JSON array of repositories', {
      details: { receivedType: raw === null ? 'null' : typeof raw },
    });
  }

  const result = DatasetSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .slice(0, 5)
      .map((i) => `- ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new ParseError(`Starred dataset has malformed records:\n${issues}`, {
      cause: result.error,
    });
  }

  return result.data;
}
