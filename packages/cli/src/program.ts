import { Command } from 'commander';
import { registerSearchCommand, type SearchCommandDeps } from './commands/search';
import { version } from './version';

export interface GlobalOptions {
  json?: boolean;
  debug?: boolean;
  config?: string;
}

export function createProgram(deps: SearchCommandDeps = {}): Command {
  const program = new Command();

  program
    .name('starsift')
    .description('Fuzzy search over the repositories a GitHub user has starred')
    .version(version, '-v, --version')
    .option('-j, --json', 'Output results as JSON')
    .option('-d, --debug', 'Enable debug logging and structured events on stderr')
    .option('--config <path>', 'Path to configuration file')
    .exitOverride();

  registerSearchCommand(program, deps);
  return program;
}
