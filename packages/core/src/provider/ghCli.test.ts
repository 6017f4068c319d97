import { describe, it, expect, vi, beforeEach } from 'vitest';
import { execa } from 'execa';
import { ProviderError, ValidationError } from '@starsift/shared';
import { GhCliDatasetProvider, joinPages, runGh, type GhRunner } from './ghCli';
import { StaticDatasetProvider } from './static';

vi.mock('execa', () => ({
  execa: vi.fn(async () => ({ stdout: '[]' })),
}));

describe('joinPages', () => {
  it('joins back-to-back pages into one array', () => {
    expect(joinPages('[{"name":"a"}][{"name":"b"}]')).toBe('[{"name":"a"},{"name":"b"}]');
    expect(joinPages('[{"name":"a"}]\n[{"name":"b"}]\n')).toBe('[{"name":"a"},{"name":"b"}]');
  });

  it('leaves brackets inside strings alone', () => {
    expect(joinPages('[{"description":"a ][ b \\"]["}]')).toBe(
      '[{"description":"a ][ b \\"]["}]',
    );
  });

  it('drops empty pages and treats no output as an empty listing', () => {
    expect(joinPages('[]\n[]')).toBe('[]');
    expect(joinPages('')).toBe('[]');
  });

  it('returns non-array output unchanged', () => {
    expect(joinPages('{"message":"Not Found"}')).toBe('{"message":"Not Found"}');
  });

  it('rejects a truncated page', () => {
    expect(() => joinPages('[{"name":"a"}][{"name":')).toThrow(ProviderError);
  });
});

describe('GhCliDatasetProvider', () => {
  beforeEach(() => {
    vi.mocked(execa).mockClear();
  });

  it('asks gh for every page of the starred listing', async () => {
    const calls: string[][] = [];
    const run: GhRunner = async (args) => {
      calls.push(args);
      return { stdout: '[{"name":"a"}]\n[{"name":"b"}]' };
    };

    const bytes = await new GhCliDatasetProvider({ run }).fetchStarred('octocat');

    expect(calls).toEqual([['api', '--paginate', 'users/octocat/starred']]);
    expect(bytes.toString('utf8')).toBe('[{"name":"a"},{"name":"b"}]');
  });

  it('wraps a failing gh invocation in a ProviderError with its stderr', async () => {
    const run: GhRunner = async () => {
      throw Object.assign(new Error('Command failed with exit code 1'), {
        stderr: 'gh: Not Found (HTTP 404)',
      });
    };

    const error = await new GhCliDatasetProvider({ run })
      .fetchStarred('nobody')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({
      message: 'gh api failed for nobody: gh: Not Found (HTTP 404)',
      details: { stderr: 'gh: Not Found (HTTP 404)' },
    });
  });

  it('falls back to the error message when stderr is empty', async () => {
    const run: GhRunner = async () => {
      throw new Error('spawn gh ENOENT');
    };

    await expect(new GhCliDatasetProvider({ run }).fetchStarred('octocat')).rejects.toThrow(
      'gh api failed for octocat: spawn gh ENOENT',
    );
  });

  it('rejects an empty user without running gh', async () => {
    const run = vi.fn<GhRunner>();

    await expect(new GhCliDatasetProvider({ run }).fetchStarred(' ')).rejects.toBeInstanceOf(
      ValidationError,
    );
    expect(run).not.toHaveBeenCalled();
  });

  it('runs the gh binary through execa by default', async () => {
    const bytes = await new GhCliDatasetProvider().fetchStarred('octocat');

    expect(vi.mocked(execa)).toHaveBeenCalledWith('gh', ['api', '--paginate', 'users/octocat/starred']);
    expect(bytes.toString()).toBe('[]');
  });

  it('exposes the default runner', async () => {
    await expect(runGh(['--version'])).resolves.toEqual({ stdout: '[]' });
  });
});

describe('StaticDatasetProvider', () => {
  it('serves its payload and records each request', async () => {
    const provider = new StaticDatasetProvider('[{"name":"a"}]');

    const first = await provider.fetchStarred('octocat');
    const second = await provider.fetchStarred('hubot');

    expect(first.toString()).toBe('[{"name":"a"}]');
    expect(second.equals(first)).toBe(true);
    expect(provider.requests).toEqual(['octocat', 'hubot']);
  });
});
