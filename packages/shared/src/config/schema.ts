import { z } from 'zod';

export const DEFAULT_MAX_DISTANCE = 2;
export const DEFAULT_LIMIT = 10;
export const DEFAULT_CACHE_PREFIX = 'stars_';

export const GitHubConfigSchema = z
  .object({
    apiBaseUrl: z.string().url().default('https://api.github.com'),
    apiVersion: z.string().default('2022-11-28'),
  })
  .default({});

/**
 * Where the starred listing is cached.
 * `file` pins one path for every user and fingerprint; otherwise a file named
 * after the fingerprint is created inside `dir` (the OS temp dir by default).
 */
export const CacheConfigSchema = z
  .object({
    dir: z.string().min(1).optional(),
    file: z.string().min(1).optional(),
    prefix: z
      .string()
      .regex(/^[A-Za-z0-9_.-]+$/, 'prefix may only contain letters, digits, "_", "." and "-"')
      .default(DEFAULT_CACHE_PREFIX),
  })
  .default({});

export const SearchConfigSchema = z
  .object({
    /** Maximum Levenshtein distance for a token to count as a match */
    maxDistance: z.number().int().min(0).max(10).default(DEFAULT_MAX_DISTANCE),
    /** Default number of results; any negative value returns everything */
    limit: z.number().int().default(DEFAULT_LIMIT),
  })
  .default({});

export const ConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  github: GitHubConfigSchema,
  cache: CacheConfigSchema,
  search: SearchConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;
export type GitHubConfig = z.infer<typeof GitHubConfigSchema>;
export type CacheConfig = z.infer<typeof CacheConfigSchema>;
export type SearchConfig = z.infer<typeof SearchConfigSchema>;

/** Input shape accepted by the schema, i.e. what a YAML file or CLI flags may supply. */
export type ConfigInput = z.input<typeof ConfigSchema>;

export function defaultConfig(): Config {
  return ConfigSchema.parse({});
}
