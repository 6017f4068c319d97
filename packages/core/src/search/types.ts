import { z } from 'zod';

/** Accepts `null` as well as a missing field and maps both to `empty`. */
function orEmpty<T extends z.ZodTypeAny>(schema: T, empty: z.output<T>) {
  return schema.nullish().transform((value): z.output<T> => value ?? empty);
}

const OwnerSchema = z
  .object({
    login: orEmpty(z.string(), ''),
    url: orEmpty(z.string(), ''),
  })
  .passthrough();

/**
 * One record of the starred listing, as returned by
 * `GET /users/{user}/starred`. Fields the search never reads pass through
 * untouched so JSON output keeps the upstream record.
 */
export const RepositorySchema = z
  .object({
    name: z.string(),
    full_name: orEmpty(z.string(), ''),
    private: orEmpty(z.boolean(), false),
    html_url: orEmpty(z.string(), ''),
    owner: orEmpty(OwnerSchema, { login: '', url: '' }),
    description: z.string().nullish().transform((value) => value ?? null),
    fork: orEmpty(z.boolean(), false),
    stargazers_count: orEmpty(z.number().int().nonnegative(), 0),
    topics: orEmpty(z.array(z.string()), []),
  })
  .passthrough();

export const DatasetSchema = z.array(RepositorySchema);

export type Repository = Readonly<z.infer<typeof RepositorySchema>>;

export type MatchTier = 'name' | 'description' | 'topic';

export interface Match {
  repository: Repository;
  score: number;
  tier: MatchTier;
  /** Levenshtein distance between the needle and the matched token */
  distance: number;
  needle: string;
  /** Name word, description word or topic that matched */
  token: string;
}

export interface SearchOptions {
  /** Maximum edit distance for a token to count as a hit */
  maxDistance?: number;
}
