/**
 * GitHub API Service - Read-only repository and profile lookups
 *
 * Key Features:
 * - Profile, repository, commit, issue and search lookups for bot commands
 * - Rate-limit status for /status and the status API
 * - Responses validated with zod before they reach the formatters
 *
 * Every lookup resolves `null` (or an empty list) on 404, 403, any other HTTP
 * error, a timeout, a network fault or an unexpected response shape. Nothing
 * here throws.
 *
 * @since 2025
 */

import fetch from 'node-fetch';
import { LogEngine } from '@wgtechlabs/log-engine';
import { z } from 'zod';
import {
    commitSchema,
    issueSchema,
    rateLimitSchema,
    repositorySchema,
    searchRepositoriesSchema,
    userSchema
} from '../types/githubApi.js';
import type {
    GitHubCommit,
    GitHubIssue,
    GitHubRateLimit,
    GitHubRepository,
    GitHubUser
} from '../types/githubApi.js';

const API_BASE_URL = 'https://api.github.com';
const REQUEST_TIMEOUT_MS = 10_000;
const USER_AGENT = 'GitHub-Telegram-Relay/1.0';

export interface GitHubClientOptions {
    baseUrl?: string;
    timeoutMs?: number;
}

type QueryParams = Record<string, string | number>;

export class GitHubClient {
    private readonly baseUrl: string;
    private readonly timeoutMs: number;

    constructor(private readonly token: string, options: GitHubClientOptions = {}) {
        this.baseUrl = options.baseUrl ?? API_BASE_URL;
        this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    }

    /**
     * Performs a GET request and validates the JSON body against a schema.
     */
    private async request<S extends z.ZodTypeAny>(
        endpoint: string,
        schema: S,
        params: QueryParams = {}
    ): Promise<z.output<S> | null> {
        const query = new URLSearchParams(
            Object.entries(params).map(([key, value]): [string, string] => [key, String(value)])
        ).toString();
        const url = `${this.baseUrl}${endpoint}${query ? `?${query}` : ''}`;

        try {
            const response = await fetch(url, {
                headers: {
                    'Authorization': `token ${this.token}`,
                    'Accept': 'application/vnd.github.v3+json',
                    'User-Agent': USER_AGENT
                },
                signal: AbortSignal.timeout(this.timeoutMs)
            });

            if (response.status === 404) {
                LogEngine.warn(`Resource not found: ${endpoint}`);
                return null;
            }

            if (response.status === 403) {
                LogEngine.error(`API rate limit exceeded or forbidden: ${endpoint}`);
                return null;
            }

            if (!response.ok) {
                const errorText = await response.text();
                LogEngine.error(`GitHub API error ${response.status}`, { endpoint, body: errorText });
                return null;
            }

            const parsed = schema.safeParse(await response.json());
            if (!parsed.success) {
                LogEngine.error('Unexpected GitHub API response shape', {
                    endpoint,
                    issues: parsed.error.issues.slice(0, 5).map(issue => `${issue.path.join('.')}: ${issue.message}`)
                });
                return null;
            }

            return parsed.data;
        } catch (error) {
            const err = error instanceof Error ? error : new Error(String(error));
            LogEngine.error(`Request error for ${endpoint}`, {
                error: err.message,
                timedOut: err.name === 'TimeoutError' || err.name === 'AbortError'
            });
            return null;
        }
    }

    /**
     * Get current API rate limit status (core quota).
     */
    async getRateLimit(): Promise<GitHubRateLimit | null> {
        const result = await this.request('/rate_limit', rateLimitSchema);
        return result ? result.rate : null;
    }

    /**
     * Get user information; the token owner when no username is given.
     */
    async getUserInfo(username?: string): Promise<GitHubUser | null> {
        const endpoint = username ? `/users/${encodeURIComponent(username)}` : '/user';
        return this.request(endpoint, userSchema);
    }

    /**
     * Get a user's most recently updated repositories.
     */
    async getUserRepositories(username?: string, limit: number = 10): Promise<GitHubRepository[]> {
        const endpoint = username ? `/users/${encodeURIComponent(username)}/repos` : '/user/repos';
        const result = await this.request(endpoint, z.array(repositorySchema), {
            sort: 'updated',
            per_page: Math.min(limit, 100)
        });
        return result ?? [];
    }

    async getRepositoryDetails(owner: string, repo: string): Promise<GitHubRepository | null> {
        return this.request(this.repoPath(owner, repo), repositorySchema);
    }

    async getRepositoryCommits(owner: string, repo: string, limit: number = 10): Promise<GitHubCommit[]> {
        const result = await this.request(`${this.repoPath(owner, repo)}/commits`, z.array(commitSchema), {
            per_page: Math.min(limit, 100)
        });
        return result ?? [];
    }

    /**
     * Get open issues. GitHub's issues endpoint also lists pull requests.
     */
    async getRepositoryIssues(owner: string, repo: string, limit: number = 10): Promise<GitHubIssue[]> {
        const result = await this.request(`${this.repoPath(owner, repo)}/issues`, z.array(issueSchema), {
            state: 'open',
            per_page: Math.min(limit, 100)
        });
        return result ?? [];
    }

    /**
     * Search repositories, most starred first.
     */
    async searchRepositories(query: string, limit: number = 10): Promise<GitHubRepository[]> {
        const result = await this.request('/search/repositories', searchRepositoriesSchema, {
            q: query,
            sort: 'stars',
            order: 'desc',
            per_page: Math.min(limit, 100)
        });
        return result ? result.items : [];
    }

    private repoPath(owner: string, repo: string): string {
        return `/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}`;
    }
}
