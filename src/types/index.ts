/**
 * GitHub Telegram Relay - Core Type Definitions
 *
 * Type Categories:
 * - Bot Context: the Telegraf context every command receives
 * - GitHub payloads and API responses (re-exported from their schema modules)
 *
 * @since 2025
 */
import type { Context } from 'telegraf';
import type { Update } from 'telegraf/types';

// Bot context - the base Telegraf context narrowed to regular updates
export type BotContext = Context<Update>;

export type {
    GitHubEventType,
    PushEvent,
    IssuesEvent,
    PullRequestEvent,
    ReleaseEvent,
    PingEvent
} from './githubEvents.js';

export type {
    GitHubUser,
    GitHubRepository,
    GitHubCommit,
    GitHubIssue,
    GitHubRateLimit
} from './githubApi.js';
