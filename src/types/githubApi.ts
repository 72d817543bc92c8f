/**
 * GitHub REST API Response Schemas
 *
 * Responses are validated before they reach the formatters, so a changed or
 * truncated response degrades to defaults instead of rendering `undefined`.
 */
import { z } from 'zod';
import { count, section, text } from './githubEvents.js';

export const userSchema = z.object({
    login: text('Unknown'),
    name: text(''),
    bio: text(''),
    public_repos: count,
    followers: count,
    following: count,
    location: text(''),
    company: text(''),
    blog: text(''),
    created_at: text(''),
    html_url: text('')
});

export const repositorySchema = z.object({
    name: text('Unknown'),
    full_name: text('Unknown'),
    description: text('No description'),
    language: text('Unknown'),
    stargazers_count: count,
    forks_count: count,
    watchers_count: count,
    open_issues_count: count,
    size: count,
    default_branch: text('main'),
    private: z.boolean().nullish().transform(value => value ?? false),
    created_at: text(''),
    updated_at: text(''),
    html_url: text('')
});

export const commitSchema = z.object({
    sha: text(''),
    html_url: text(''),
    commit: section({
        message: text('No message'),
        author: section({
            name: text('Unknown'),
            date: text('')
        })
    })
});

export const issueSchema = z.object({
    number: count,
    title: text('No title'),
    state: text('unknown'),
    html_url: text(''),
    user: section({ login: text('Unknown') })
});

const rateSchema = z.object({
    limit: count,
    remaining: count,
    reset: count,
    used: count
});

export const rateLimitSchema = z.object({
    rate: rateSchema
});

export const searchRepositoriesSchema = z.object({
    total_count: count,
    items: z.array(repositorySchema)
});

export type GitHubUser = z.output<typeof userSchema>;
export type GitHubRepository = z.output<typeof repositorySchema>;
export type GitHubCommit = z.output<typeof commitSchema>;
export type GitHubIssue = z.output<typeof issueSchema>;
export type GitHubRateLimit = z.output<typeof rateSchema>;
