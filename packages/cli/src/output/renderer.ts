import pc from 'picocolors';
import { AppError } from '@starsift/shared';
import type { Match } from '@starsift/core';
import { formatTable } from './table';

export const MATCH_COLUMNS = ['Name', 'URL', 'Description', 'Stars', 'Rank'];

export function toRow(match: Match): string[] {
  const { repository } = match;
  return [
    repository.full_name,
    repository.html_url,
    repository.description ?? '',
    String(repository.stargazers_count),
    String(Math.round(match.score)),
  ];
}

export interface ErrorRenderOptions {
  /** Print the stack trace in human mode */
  verbose?: boolean;
}

export class OutputRenderer {
  constructor(private isJson: boolean) {}

  /**
   * Writes matches to stdout in rank order: the repository records as a JSON
   * array, or a table that shows only its header when nothing matched.
   */
  renderMatches(matches: Match[]): void {
    if (this.isJson) {
      console.log(JSON.stringify(matches.map((m) => m.repository), null, 2));
    } else {
      console.log(formatTable(MATCH_COLUMNS, matches.map(toRow)));
    }
  }

  error(e: unknown, options: ErrorRenderOptions = {}): void {
    if (this.isJson) {
      const error =
        e instanceof AppError
          ? { code: e.code, message: e.message, details: e.details }
          : { code: 'UnknownError', message: e instanceof Error ? e.message : String(e) };
      console.log(JSON.stringify({ error }));
      return;
    }

    console.error(pc.red(`Error: ${(e instanceof Error && e.message) || String(e)}`));
    if (e instanceof AppError && e.details) {
      console.error(
        `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
      );
    }
    if (options.verbose && e instanceof Error && e.stack) {
      console.error(`\nStack Trace:\n${e.stack}`);
    }
  }
}
