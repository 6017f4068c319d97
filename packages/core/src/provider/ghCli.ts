import { execa } from 'execa';
import { ProviderError, ValidationError, type Logger } from '@starsift/shared';
import type { StarredDatasetProvider } from './types';

export interface GhOutput {
  stdout: string;
}

/** Runs `gh` with the given arguments and resolves with its standard output. */
export type GhRunner = (args: string[]) => Promise<GhOutput>;

export interface GhCliDatasetProviderOptions {
  run?: GhRunner;
  logger?: Logger;
}

export const runGh: GhRunner = async (args) => {
  const { stdout } = await execa('gh', args);
  return { stdout };
};

function stderrOf(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'stderr' in error) {
    const { stderr } = error;
    return typeof stderr === 'string' && stderr !== '' ? stderr : undefined;
  }
  return undefined;
}

/**
 * Joins the pages `gh api --paginate` prints back to back (`[...][...]`)
 * into a single JSON array. Brackets inside string literals are left alone.
 * Output that is not a sequence of arrays is returned unchanged.
 */
export function joinPages(output: string): string {
  const trimmed = output.trim();
  if (trimmed === '') {
    return '[]';
  }
  if (!trimmed.startsWith('[')) {
    return output;
  }

  const pages: string[] = [];
  let depth = 0;
  let start = -1;
  let inString = false;
  let escaped = false;

  for (let i = 0; i < trimmed.length; i++) {
    const ch = trimmed[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === '[' || ch === '{') {
      if (depth === 0 && ch === '[') {
        start = i;
      }
      depth++;
    } else if (ch === ']' || ch === '}') {
      depth--;
      if (depth === 0 && start >= 0) {
        const body = trimmed.slice(start + 1, i).trim();
        if (body !== '') {
          pages.push(body);
        }
        start = -1;
      }
    }
  }

  if (depth !== 0 || inString) {
    throw new ProviderError('gh returned truncated output');
  }
  return `[${pages.join(',')}]`;
}

/**
 * Fetches every page of a user's starred listing through the GitHub CLI,
 * which takes care of authentication and pagination.
 */
export class GhCliDatasetProvider implements StarredDatasetProvider {
  private readonly run: GhRunner;
  private readonly logger?: Logger;

  constructor(options: GhCliDatasetProviderOptions = {}) {
    this.run = options.run ?? runGh;
    this.logger = options.logger;
  }

  async fetchStarred(user: string): Promise<Buffer> {
    if (user.trim() === '') {
      throw new ValidationError('user cannot be empty');
    }

    const args = ['api', '--paginate', `users/${user}/starred`];
    this.logger?.debug(`Running gh ${args.join(' ')}`);

    let stdout: string;
    try {
      ({ stdout } = await this.run(args));
    } catch (e) {
      const stderr = stderrOf(e);
      throw new ProviderError(
        `gh api failed for ${user}: ${stderr ?? (e instanceof Error ? e.message : String(e))}`,
        { cause: e, details: { args, stderr } },
      );
    }

    return Buffer.from(joinPages(stdout), 'utf8');
  }
}
