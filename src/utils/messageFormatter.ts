/**
 * Message Formatter - MarkdownV2 replies for GitHub lookups
 *
 * Builds the text of command replies from validated GitHub API responses.
 * Values from GitHub are escaped here; template text is written pre-escaped.
 *
 * @since 2025
 */
import type { NotifyFlags, RateLimitSettings } from '../config/env.js';
import type {
    GitHubCommit,
    GitHubIssue,
    GitHubRateLimit,
    GitHubRepository,
    GitHubUser
} from '../types/githubApi.js';
import { escapeMarkdown, escapeMarkdownCode, escapeMarkdownUrl, markdownLink, truncateText } from './markdownEscape.js';

const SEARCH_DESCRIPTION_LIMIT = 100;

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Formats an ISO-8601 string or a Unix timestamp (seconds) as
 * `YYYY-MM-DD HH:MM UTC`. Unparseable input gives `Unknown date`.
 *
 * The result is plain text; escape it before putting it in a message.
 */
export function formatTimestamp(value: string | number): string {
    if (value === '' || value === 0) {
        return 'Unknown date';
    }

    const date = typeof value === 'number' ? new Date(value * 1000) : new Date(value);
    if (Number.isNaN(date.getTime())) {
        return 'Unknown date';
    }

    return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
        `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())} UTC`;
}

export function formatUserInfo(user: GitHubUser): string {
    let message = `👤 *GitHub Profile: ${escapeMarkdown(user.login)}*\n\n`;

    if (user.name) {
        message += `🏷️ *Name:* ${escapeMarkdown(user.name)}\n`;
    }
    if (user.bio) {
        message += `📝 *Bio:* ${escapeMarkdown(user.bio)}\n`;
    }

    message += '📊 *Stats:*\n';
    message += `• 📦 Repositories: ${user.public_repos}\n`;
    message += `• 👥 Followers: ${user.followers}\n`;
    message += `• 👁️ Following: ${user.following}\n`;

    if (user.location) {
        message += `📍 *Location:* ${escapeMarkdown(user.location)}\n`;
    }
    if (user.company) {
        message += `🏢 *Company:* ${escapeMarkdown(user.company)}\n`;
    }
    if (user.blog) {
        message += `🌐 *Website:* ${escapeMarkdown(user.blog)}\n`;
    }
    if (user.created_at) {
        message += `📅 *Joined:* ${escapeMarkdown(formatTimestamp(user.created_at))}\n`;
    }
    if (user.html_url) {
        message += `\n🔗 ${markdownLink('View Profile', user.html_url)}`;
    }

    return message;
}

export function formatRepositoryInfo(repo: GitHubRepository): string {
    let message = `📦 *Repository: ${escapeMarkdown(repo.full_name)}*\n\n`;
    message += `📝 *Description:* ${escapeMarkdown(repo.description)}\n\n`;

    message += '📊 *Statistics:*\n';
    message += `• ⭐ Stars: ${repo.stargazers_count}\n`;
    message += `• 🍴 Forks: ${repo.forks_count}\n`;
    message += `• 👁️ Watchers: ${repo.watchers_count}\n`;
    message += `• 🐛 Open Issues: ${repo.open_issues_count}\n`;
    message += `• 📏 Size: ${repo.size} KB\n`;

    message += '\n🔧 *Details:*\n';
    message += `• 💻 Language: ${escapeMarkdown(repo.language)}\n`;
    message += `• 🌿 Default Branch: ${escapeMarkdown(repo.default_branch)}\n`;
    message += `• 🔒 Visibility: ${repo.private ? 'Private' : 'Public'}\n`;

    if (repo.created_at) {
        message += `• 📅 Created: ${escapeMarkdown(formatTimestamp(repo.created_at))}\n`;
    }
    if (repo.updated_at) {
        message += `• 🔄 Updated: ${escapeMarkdown(formatTimestamp(repo.updated_at))}\n`;
    }
    if (repo.html_url) {
        message += `\n🔗 ${markdownLink('View Repository', repo.html_url)}`;
    }

    return message;
}

export function formatRepositoryList(repos: readonly GitHubRepository[]): string {
    const lines = repos.map(repo =>
        `📦 *${escapeMarkdown(repo.name)}* \\- ⭐ ${repo.stargazers_count} stars`
    );
    return `📚 *Repositories:*\n\n${lines.join('\n')}`;
}

export function formatCommitList(repoPath: string, commits: readonly GitHubCommit[]): string {
    let message = `📝 *Recent Commits for ${escapeMarkdown(repoPath)}:*\n\n`;

    for (const commit of commits) {
        const { author } = commit.commit;
        const date = author.date ? formatTimestamp(author.date) : 'Unknown date';
        const sha = `\`${escapeMarkdownCode(commit.sha.substring(0, 7))}\``;

        message += `🔸 *${escapeMarkdown(commit.commit.message)}*\n`;
        message += `👤 ${escapeMarkdown(author.name)} • 🕒 ${escapeMarkdown(date)}\n`;
        message += commit.html_url
            ? `🔗 [${sha}](${escapeMarkdownUrl(commit.html_url)})\n\n`
            : `🔗 ${sha}\n\n`;
    }

    return message;
}

export function formatIssueList(repoPath: string, issues: readonly GitHubIssue[]): string {
    let message = `🐛 *Issues for ${escapeMarkdown(repoPath)}:*\n\n`;

    for (const issue of issues) {
        const stateIcon = issue.state === 'open' ? '🟢' : '🔴';

        message += `${stateIcon} *\\#${issue.number}: ${escapeMarkdown(issue.title)}*\n`;
        message += `👤 ${escapeMarkdown(issue.user.login)} • 📋 ${escapeMarkdown(issue.state)}\n`;
        if (issue.html_url) {
            message += `🔗 ${markdownLink('View Issue', issue.html_url)}\n`;
        }
        message += '\n';
    }

    return message;
}

export function formatSearchResults(query: string, repos: readonly GitHubRepository[]): string {
    let message = `🔍 *Search Results for: ${escapeMarkdown(query)}*\n\n`;

    for (const repo of repos) {
        message += `📦 *${escapeMarkdown(repo.name)}*\n`;
        message += `🔗 ${escapeMarkdown(repo.full_name)}\n`;
        message += `📝 ${escapeMarkdown(truncateText(repo.description, SEARCH_DESCRIPTION_LIMIT))}\n`;
        message += repo.html_url
            ? `⭐ ${repo.stargazers_count} stars • ${markdownLink('View', repo.html_url)}\n\n`
            : `⭐ ${repo.stargazers_count} stars\n\n`;
    }

    return message;
}

export interface StatusSummary {
    rateLimit: GitHubRateLimit | null;
    commandLimit: RateLimitSettings;
    notifications: NotifyFlags;
}

export function formatStatus(summary: StatusSummary): string {
    const { rateLimit, commandLimit, notifications } = summary;
    const toggle = (enabled: boolean): string => (enabled ? 'on' : 'off');

    let message = '📊 *Bot Status*\n\n';
    message += '🤖 *Bot:* Running\n';
    message += `🔧 *GitHub API:* ${rateLimit ? 'Connected' : 'Unavailable'}\n`;

    if (rateLimit) {
        message += `📈 *API Limits:* ${rateLimit.remaining}/${rateLimit.limit} remaining\n`;
        if (rateLimit.reset) {
            message += `🔄 *Reset:* ${escapeMarkdown(formatTimestamp(rateLimit.reset))}\n`;
        }
    }

    message += '\n⚙️ *Configuration:*\n';
    message += `• Rate limit: ${commandLimit.requests} req/${commandLimit.windowSeconds}s\n`;
    message += `• Notifications: push ${toggle(notifications.push)}, issues ${toggle(notifications.issues)}, ` +
        `pull requests ${toggle(notifications.pullRequests)}, releases ${toggle(notifications.releases)}\n`;

    return message;
}
