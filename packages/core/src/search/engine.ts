import { distance } from 'fastest-levenshtein';
import { DEFAULT_MAX_DISTANCE } from '@starsift/shared';
import { ResultQueue } from '../queue/resultQueue';
import { parseDataset } from './dataset';
import { scoreFor } from './scoring';
import type { Match, MatchTier, Repository, SearchOptions } from './types';

const WHITESPACE = /\s+/;
const NAME_SEPARATORS = /[-_]/;
const SURROGATE = /[\uD800-\uDFFF]/;
const PRIVATE_USE_START = 0xe000;

/**
 * Levenshtein distance counted in code points, so an emoji costs one edit
 * like any other character. Strings holding astral characters are re-encoded
 * onto one UTF-16 unit per distinct code point before comparing.
 */
export function tokenDistance(a: string, b: string): number {
  if (!SURROGATE.test(a) && !SURROGATE.test(b)) {
    return distance(a, b);
  }

  const units = new Map<string, string>();
  const encode = (text: string) =>
    Array.from(text, (codePoint) => {
      let unit = units.get(codePoint);
      if (unit === undefined) {
        unit = String.fromCharCode(PRIVATE_USE_START + units.size);
        units.set(codePoint, unit);
      }
      return unit;
    }).join('');

  return distance(encode(a), encode(b));
}

function fields(text: string, separator: RegExp): string[] {
  return text.split(separator).filter((part) => part.length > 0);
}

export function tokenizeQuery(query: string): string[] {
  return fields(query, WHITESPACE);
}

export function nameTokens(name: string): string[] {
  return fields(name, NAME_SEPARATORS);
}

export function createMatchQueue(): ResultQueue<Match> {
  return new ResultQueue<Match>((match) => match.score);
}

/**
 * Scores one repository against one needle.
 *
 * A name hit is decisive: only the first qualifying name word counts and the
 * description and topics are not looked at. Otherwise every qualifying
 * description word and every qualifying topic produces its own match.
 */
export function scoreRepository(repository: Repository, needle: string, maxDistance: number): Match[] {
  const hit = (tier: MatchTier, token: string, d: number): Match => ({
    repository,
    tier,
    token,
    needle,
    distance: d,
    score: scoreFor(tier, d, maxDistance),
  });

  for (const word of nameTokens(repository.name)) {
    const d = tokenDistance(needle, word);
    if (d <= maxDistance) {
      return [hit('name', word, d)];
    }
  }

  const matches: Match[] = [];

  for (const word of fields(repository.description ?? '', WHITESPACE)) {
    const d = tokenDistance(needle, word);
    if (d <= maxDistance) {
      matches.push(hit('description', word, d));
    }
  }

  for (const topic of repository.topics) {
    const d = tokenDistance(needle, topic);
    if (d <= maxDistance) {
      matches.push(hit('topic', topic, d));
    }
  }

  return matches;
}

/**
 * Ranks every repository of `dataset` against every whitespace separated term
 * of `query`. The same repository may appear several times in the queue, once
 * per matching term and token.
 */
export function search(
  dataset: Buffer | string,
  query: string,
  options: SearchOptions = {},
): ResultQueue<Match> {
  const maxDistance = options.maxDistance ?? DEFAULT_MAX_DISTANCE;
  const repositories = parseDataset(dataset);
  const needles = tokenizeQuery(query);
  const queue = createMatchQueue();

  for (const repository of repositories) {
    for (const needle of needles) {
      for (const match of scoreRepository(repository, needle, maxDistance)) {
        queue.push(match);
      }
    }
  }

  return queue;
}
