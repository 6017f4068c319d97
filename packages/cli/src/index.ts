import { CommanderError } from 'commander';
import { exitCodeFor } from '@starsift/shared';
import { OutputRenderer } from './output';
import { createProgram, type GlobalOptions } from './program';
import type { SearchCommandDeps } from './commands/search';

export const name = '@starsift/cli';

export { createProgram } from './program';
export { runSearch, parseLimit, type SearchCommandDeps } from './commands/search';

/**
 * Runs the CLI and resolves with the process exit code. Errors are printed
 * here and nowhere else.
 */
export async function main(argv: string[] = process.argv, deps: SearchCommandDeps = {}) {
  const program = createProgram(deps);
  try {
    await program.parseAsync(argv);
    return 0;
  } catch (e) {
    if (e instanceof CommanderError) {
      // commander already printed help, the version or its own message
      return e.exitCode === 0 ? 0 : 2;
    }
    const opts = program.opts<GlobalOptions>();
    new OutputRenderer(Boolean(opts.json)).error(e, { verbose: opts.debug });
    return exitCodeFor(e);
  }
}
