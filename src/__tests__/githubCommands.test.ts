/**
 * Unit tests for commands/github/GitHubCommands.ts
 */
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { BotContext } from '../types/index.js';
import type { GitHubCommit, GitHubRepository } from '../types/githubApi.js';
import { GENERIC_ERROR_MESSAGE } from '../commands/base/BaseCommand.js';
import { parseCommand } from '../commands/parser.js';
import {
  CommitsCommand,
  IssuesCommand,
  ProfileCommand,
  RepoCommand,
  ReposCommand,
  SearchCommand,
  type GitHubLookups
} from '../commands/github/GitHubCommands.js';

vi.mock('@wgtechlabs/log-engine', () => ({
  LogEngine: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn()
  }
}));

const MARKDOWN = { parse_mode: 'MarkdownV2' };

function makeRepo(overrides: Partial<GitHubRepository> = {}): GitHubRepository {
  return {
    name: 'hello-world',
    full_name: 'octocat/hello-world',
    description: 'My first repository',
    language: 'TypeScript',
    stargazers_count: 42,
    forks_count: 3,
    watchers_count: 42,
    open_issues_count: 1,
    size: 120,
    default_branch: 'main',
    private: false,
    created_at: '',
    updated_at: '',
    html_url: 'https://github.com/octocat/hello-world',
    ...overrides
  };
}

function makeLookups() {
  return {
    getUserInfo: vi.fn().mockResolvedValue(null),
    getUserRepositories: vi.fn().mockResolvedValue([]),
    getRepositoryDetails: vi.fn().mockResolvedValue(null),
    getRepositoryCommits: vi.fn().mockResolvedValue([]),
    getRepositoryIssues: vi.fn().mockResolvedValue([]),
    searchRepositories: vi.fn().mockResolvedValue([])
  } satisfies GitHubLookups;
}

function makeContext() {
  const reply = vi.fn().mockResolvedValue({ message_id: 2 });
  const ctx = { chat: { id: 100, type: 'private' }, reply } as unknown as BotContext;
  return { ctx, reply };
}

describe('GitHub commands', () => {
  let github: ReturnType<typeof makeLookups>;

  beforeEach(() => {
    vi.clearAllMocks();
    github = makeLookups();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('repository argument', () => {
    it('should ask for a repository when none is given', async () => {
      const { ctx, reply } = makeContext();

      await new RepoCommand(github).execute(ctx, parseCommand('/repo'));

      expect(reply).toHaveBeenCalledWith('❌ Please specify a repository: /repo owner/repo', {});
      expect(github.getRepositoryDetails).not.toHaveBeenCalled();
    });

    it('should reject a malformed repository', async () => {
      const { ctx, reply } = makeContext();

      await new CommitsCommand(github).execute(ctx, parseCommand('/commits octocat'));

      expect(reply).toHaveBeenCalledWith('❌ Invalid format. Use: /commits owner/repo', {});
      expect(github.getRepositoryCommits).not.toHaveBeenCalled();
    });
  });

  describe('/repo', () => {
    it('should report a missing repository in plain text', async () => {
      const { ctx, reply } = makeContext();

      await new RepoCommand(github).execute(ctx, parseCommand('/repo octocat/hello-world'));

      expect(github.getRepositoryDetails).toHaveBeenCalledWith('octocat', 'hello-world');
      expect(reply).toHaveBeenCalledWith(
        '❌ Repository octocat/hello-world not found or API error occurred.',
        {}
      );
    });

    it('should reply with MarkdownV2 details', async () => {
      github.getRepositoryDetails.mockResolvedValue(makeRepo());
      const { ctx, reply } = makeContext();

      await new RepoCommand(github).execute(ctx, parseCommand('/repo octocat/hello-world'));

      expect(reply).toHaveBeenCalledTimes(1);
      expect(reply.mock.calls[0]?.[1]).toEqual(MARKDOWN);
      expect(reply.mock.calls[0]?.[0]).toContain('📦 *Repository: octocat/hello\\-world*\n\n');
    });
  });

  describe('/commits', () => {
    it('should list the five most recent commits', async () => {
      const commit: GitHubCommit = {
        sha: 'abcdef1234567',
        html_url: 'https://github.com/octocat/hello-world/commit/abcdef1',
        commit: { message: 'Initial commit', author: { name: 'Mona', date: '2024-01-15T10:30:00Z' } }
      };
      github.getRepositoryCommits.mockResolvedValue([commit]);
      const { ctx, reply } = makeContext();

      await new CommitsCommand(github).execute(ctx, parseCommand('/commits octocat/hello-world'));

      expect(github.getRepositoryCommits).toHaveBeenCalledWith('octocat', 'hello-world', 5);
      expect(reply).toHaveBeenCalledWith(
        '📝 *Recent Commits for octocat/hello\\-world:*\n\n' +
        '🔸 *Initial commit*\n' +
        '👤 Mona • 🕒 2024\\-01\\-15 10:30 UTC\n' +
        '🔗 [`abcdef1`](https://github.com/octocat/hello-world/commit/abcdef1)\n\n',
        MARKDOWN
      );
    });
  });

  describe('/issues', () => {
    it('should say so when there are no open issues', async () => {
      const { ctx, reply } = makeContext();

      await new IssuesCommand(github).execute(ctx, parseCommand('/issues octocat/hello-world'));

      expect(github.getRepositoryIssues).toHaveBeenCalledWith('octocat', 'hello-world', 5);
      expect(reply).toHaveBeenCalledWith('❌ No issues found for octocat/hello-world or API error occurred.', {});
    });
  });

  describe('/profile', () => {
    it('should look up the token owner when no username is given', async () => {
      const { ctx, reply } = makeContext();

      await new ProfileCommand(github).execute(ctx, parseCommand('/profile'));

      expect(github.getUserInfo).toHaveBeenCalledWith(undefined);
      expect(reply).toHaveBeenCalledWith('❌ User not found or API error occurred.', {});
    });
  });

  describe('/repos', () => {
    it('should list up to ten repositories', async () => {
      github.getUserRepositories.mockResolvedValue([makeRepo()]);
      const { ctx, reply } = makeContext();

      await new ReposCommand(github).execute(ctx, parseCommand('/repos octocat'));

      expect(github.getUserRepositories).toHaveBeenCalledWith('octocat', 10);
      expect(reply).toHaveBeenCalledWith(
        '📚 *Repositories:*\n\n📦 *hello\\-world* \\- ⭐ 42 stars',
        MARKDOWN
      );
    });
  });

  describe('/search', () => {
    it('should ask for a query when none is given', async () => {
      const { ctx, reply } = makeContext();

      await new SearchCommand(github).execute(ctx, parseCommand('/search'));

      expect(reply).toHaveBeenCalledWith('❌ Please specify a search query: /search <query>', {});
      expect(github.searchRepositories).not.toHaveBeenCalled();
    });

    it('should search with the whole argument text', async () => {
      const { ctx, reply } = makeContext();

      await new SearchCommand(github).execute(ctx, parseCommand('/search telegram bot'));

      expect(github.searchRepositories).toHaveBeenCalledWith('telegram bot', 8);
      expect(reply).toHaveBeenCalledWith('❌ No repositories found for query: telegram bot', {});
    });
  });

  describe('error handling', () => {
    it('should reply with a generic message and an error id when a lookup throws', async () => {
      vi.spyOn(Date, 'now').mockReturnValue(1_700_000_000_000);
      github.getRepositoryDetails.mockRejectedValue(new Error('socket hang up'));
      const { ctx, reply } = makeContext();

      await new RepoCommand(github).execute(ctx, parseCommand('/repo octocat/hello-world'));

      expect(reply).toHaveBeenCalledWith(
        `${GENERIC_ERROR_MESSAGE}\n\nError ID: ${(1_700_000_000_000).toString(36)}`,
        {}
      );
    });
  });
});
