import { Command } from 'commander';
import {
  ConfigLoader,
  GhCliDatasetProvider,
  searchStarred,
  type StarredDatasetProvider,
} from '@starsift/core';
import { ConsoleLogger, UsageError } from '@starsift/shared';
import { OutputRenderer } from '../output';

export interface SearchOptions {
  user?: string;
  find?: string;
  cacheFile?: string;
  limit?: string;
  json?: boolean;
  debug?: boolean;
  config?: string;
}

/** Collaborators that tests replace; production uses gh, global fetch and the real directories. */
export interface SearchCommandDeps {
  provider?: StarredDatasetProvider;
  fetchImpl?: typeof fetch;
  cwd?: string;
  homeDir?: string;
  runId?: string;
}

export function parseLimit(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new UsageError(`Invalid --limit value: ${value}`, {
      details: 'Expected an integer; use -1 to return every match.',
    });
  }
  return Number.parseInt(value, 10);
}

export async function runSearch(options: SearchOptions, deps: SearchCommandDeps = {}) {
  if (!options.user) {
    throw new UsageError('--user is required');
  }
  if (!options.find) {
    throw new UsageError('--find is required');
  }
  const limit = options.limit === undefined ? undefined : parseLimit(options.limit);

  const config = ConfigLoader.load({
    configPath: options.config,
    cwd: deps.cwd,
    homeDir: deps.homeDir,
    flags: { search: { limit } },
  });

  const logger = new ConsoleLogger({ verbose: options.debug });
  const provider = deps.provider ?? new GhCliDatasetProvider({ logger });

  const result = await searchStarred(
    { config, logger, provider, fetchImpl: deps.fetchImpl, runId: deps.runId },
    { user: options.user, query: options.find, cacheFile: options.cacheFile },
  );

  logger.info(
    `${result.totalMatches} matches in ${result.cachePath} (${result.cacheHit ? 'cached' : 'fetched'})`,
  );
  new OutputRenderer(Boolean(options.json)).renderMatches(result.matches);
}

export function registerSearchCommand(program: Command, deps: SearchCommandDeps = {}) {
  program
    .option('-u, --user <handle>', 'GitHub user whose stars are searched')
    .option('-f, --find <keyword>', 'Text to look for in names, descriptions and topics')
    .option('-c, --cache-file <path>', 'Cache file to use instead of the derived one')
    .option('-l, --limit <number>', 'Maximum number of results, -1 for all')
    .action(async () => {
      await runSearch(program.opts<SearchOptions>(), deps);
    });
}
