/**
 * GitHub Lookup Commands
 *
 * /profile, /repos, /repo, /commits, /issues and /search. Each validates its
 * arguments, asks the GitHub client and replies with a formatted MarkdownV2
 * message. Usage hints and lookup failures are sent as plain text because
 * they echo what the user typed.
 */

import { BaseCommand, type CommandMetadata } from '../base/BaseCommand.js';
import type { BotContext } from '../../types/index.js';
import type { GitHubClient } from '../../services/github.js';
import { parseRepositoryPath, type CommandInput, type RepositoryPath } from '../parser.js';
import {
    formatCommitList,
    formatIssueList,
    formatRepositoryInfo,
    formatRepositoryList,
    formatSearchResults,
    formatUserInfo
} from '../../utils/messageFormatter.js';

export const COMMIT_LIST_LIMIT = 5;
export const ISSUE_LIST_LIMIT = 5;
export const REPOSITORY_LIST_LIMIT = 10;
export const SEARCH_RESULT_LIMIT = 8;

export type GitHubLookups = Pick<
    GitHubClient,
    | 'getUserInfo'
    | 'getUserRepositories'
    | 'getRepositoryDetails'
    | 'getRepositoryCommits'
    | 'getRepositoryIssues'
    | 'searchRepositories'
>;

abstract class GitHubCommand extends BaseCommand {
    constructor(protected readonly github: GitHubLookups) {
        super();
    }

    /**
     * Reads `owner/repo` from the first argument, replying with a usage hint
     * when it is missing or malformed.
     */
    protected async requireRepository(ctx: BotContext, input: CommandInput): Promise<RepositoryPath | null> {
        const [path] = input.args;
        if (!path) {
            await this.replyText(ctx, `❌ Please specify a repository: ${this.metadata.usage}`);
            return null;
        }

        const parsed = parseRepositoryPath(path);
        if (!parsed) {
            await this.replyText(ctx, `❌ Invalid format. Use: ${this.metadata.usage}`);
            return null;
        }
        return parsed;
    }
}

export class ProfileCommand extends GitHubCommand {
    readonly metadata: CommandMetadata = {
        name: 'profile',
        description: 'Show a GitHub profile (yours when no username is given)',
        usage: '/profile [username]',
        examples: ['/profile octocat']
    };

    protected async executeCommand(ctx: BotContext, input: CommandInput): Promise<void> {
        const user = await this.github.getUserInfo(input.args[0]);
        if (!user) {
            await this.replyText(ctx, '❌ User not found or API error occurred.');
            return;
        }
        await this.replyMarkdown(ctx, formatUserInfo(user));
    }
}

export class ReposCommand extends GitHubCommand {
    readonly metadata: CommandMetadata = {
        name: 'repos',
        description: 'List recently updated repositories',
        usage: '/repos [username]',
        examples: ['/repos octocat']
    };

    protected async executeCommand(ctx: BotContext, input: CommandInput): Promise<void> {
        const repositories = await this.github.getUserRepositories(input.args[0], REPOSITORY_LIST_LIMIT);
        if (repositories.length === 0) {
            await this.replyText(ctx, '❌ No repositories found or API error occurred.');
            return;
        }
        await this.replyMarkdown(ctx, formatRepositoryList(repositories));
    }
}

export class RepoCommand extends GitHubCommand {
    readonly metadata: CommandMetadata = {
        name: 'repo',
        description: 'Show repository details',
        usage: '/repo owner/repo',
        examples: ['/repo octocat/hello-world']
    };

    protected async executeCommand(ctx: BotContext, input: CommandInput): Promise<void> {
        const path = await this.requireRepository(ctx, input);
        if (!path) {
            return;
        }

        const repository = await this.github.getRepositoryDetails(path.owner, path.repo);
        if (!repository) {
            await this.replyText(ctx, `❌ Repository ${path.owner}/${path.repo} not found or API error occurred.`);
            return;
        }
        await this.replyMarkdown(ctx, formatRepositoryInfo(repository));
    }
}

export class CommitsCommand extends GitHubCommand {
    readonly metadata: CommandMetadata = {
        name: 'commits',
        description: 'Show recent commits',
        usage: '/commits owner/repo'
    };

    protected async executeCommand(ctx: BotContext, input: CommandInput): Promise<void> {
        const path = await this.requireRepository(ctx, input);
        if (!path) {
            return;
        }

        const repoPath = `${path.owner}/${path.repo}`;
        const commits = await this.github.getRepositoryCommits(path.owner, path.repo, COMMIT_LIST_LIMIT);
        if (commits.length === 0) {
            await this.replyText(ctx, `❌ No commits found for ${repoPath} or API error occurred.`);
            return;
        }
        await this.replyMarkdown(ctx, formatCommitList(repoPath, commits));
    }
}

export class IssuesCommand extends GitHubCommand {
    readonly metadata: CommandMetadata = {
        name: 'issues',
        description: 'Show open issues',
        usage: '/issues owner/repo'
    };

    protected async executeCommand(ctx: BotContext, input: CommandInput): Promise<void> {
        const path = await this.requireRepository(ctx, input);
        if (!path) {
            return;
        }

        const repoPath = `${path.owner}/${path.repo}`;
        const issues = await this.github.getRepositoryIssues(path.owner, path.repo, ISSUE_LIST_LIMIT);
        if (issues.length === 0) {
            await this.replyText(ctx, `❌ No issues found for ${repoPath} or API error occurred.`);
            return;
        }
        await this.replyMarkdown(ctx, formatIssueList(repoPath, issues));
    }
}

export class SearchCommand extends GitHubCommand {
    readonly metadata: CommandMetadata = {
        name: 'search',
        description: 'Search repositories, most starred first',
        usage: '/search <query>',
        examples: ['/search telegram bot']
    };

    protected async executeCommand(ctx: BotContext, input: CommandInput): Promise<void> {
        const query = input.argText;
        if (!query) {
            await this.replyText(ctx, `❌ Please specify a search query: ${this.metadata.usage}`);
            return;
        }

        const repositories = await this.github.searchRepositories(query, SEARCH_RESULT_LIMIT);
        if (repositories.length === 0) {
            await this.replyText(ctx, `❌ No repositories found for query: ${query}`);
            return;
        }
        await this.replyMarkdown(ctx, formatSearchResults(query, repositories));
    }
}
