import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { ConfigSchema, type Config, type ConfigInput } from '@starsift/shared';

export function testConfig(overrides: ConfigInput = {}): Config {
  return ConfigSchema.parse(overrides);
}

export const fiveReposPath = fileURLToPath(new URL('./five-repos.json', import.meta.url));

export function readFiveRepos(): Buffer {
  return readFileSync(fiveReposPath);
}
