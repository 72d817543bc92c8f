import { LogEngine } from '@wgtechlabs/log-engine';
import type { z } from 'zod';
import type { NotifyFlags } from '../../config/env.js';
import {
  GITHUB_EVENT_TYPES,
  issuesEventSchema,
  pingEventSchema,
  pullRequestEventSchema,
  pushEventSchema,
  releaseEventSchema
} from '../../types/githubEvents.js';
import type {
  GitHubEventType,
  IssuesEvent,
  PingEvent,
  PullRequestEvent,
  PushEvent,
  ReleaseEvent
} from '../../types/githubEvents.js';
import {
  escapeMarkdown,
  escapeMarkdownCode,
  escapeMarkdownUrl,
  markdownLink
} from '../../utils/markdownEscape.js';

/**
 * GitHub Telegram Relay - Webhook Event Formatter
 *
 * Turns a GitHub webhook payload into a MarkdownV2 notification, or decides
 * the event is not worth a message. Every string taken from the payload is
 * escaped; the static template text is written pre-escaped.
 *
 * Supported Event Types:
 * - push: commit summary (first 3 commits), suppressed when there are no commits
 * - issues / pull_request: action, number, title and author
 * - release: published releases only
 * - ping: webhook setup confirmation, never gated by a notify flag
 *
 * A payload whose fields have the wrong type yields `null` and a warning.
 *
 * @since 2025
 */

const PUSH_COMMIT_PREVIEW = 3;

const ISSUE_ACTION_ICONS: Record<string, string> = {
  opened: '🆕',
  closed: '✅',
  reopened: '🔄',
  edited: '✏️'
};

const PULL_REQUEST_ACTION_ICONS: Record<string, string> = {
  ...ISSUE_ACTION_ICONS,
  merged: '🎉'
};

const DEFAULT_ACTION_ICON = '📋';

interface EventRoute {
  flag: keyof NotifyFlags | null;
  render: (payload: unknown) => string | null;
}

export class EventFormatter {
  private static readonly routes: Record<GitHubEventType, EventRoute> = {
    push: { flag: 'push', render: payload => EventFormatter.parse('push', pushEventSchema, payload, EventFormatter.formatPush) },
    issues: { flag: 'issues', render: payload => EventFormatter.parse('issues', issuesEventSchema, payload, EventFormatter.formatIssue) },
    pull_request: { flag: 'pullRequests', render: payload => EventFormatter.parse('pull_request', pullRequestEventSchema, payload, EventFormatter.formatPullRequest) },
    release: { flag: 'releases', render: payload => EventFormatter.parse('release', releaseEventSchema, payload, EventFormatter.formatRelease) },
    ping: { flag: null, render: payload => EventFormatter.parse('ping', pingEventSchema, payload, EventFormatter.formatPing) }
  };

  /**
   * Formats a webhook event for Telegram
   * @param eventType - Value of the `X-GitHub-Event` header
   * @param payload - Parsed JSON body
   * @returns The notification text, or null when nothing should be sent
   */
  static format(eventType: string | undefined, payload: unknown, notifyFlags: NotifyFlags): string | null {
    const type = GITHUB_EVENT_TYPES.find(known => known === eventType);
    if (!type) {
      LogEngine.debug('Ignoring unsupported GitHub event', { eventType });
      return null;
    }

    const route = EventFormatter.routes[type];
    if (route.flag && !notifyFlags[route.flag]) {
      LogEngine.debug('Notifications disabled for event type', { eventType: type });
      return null;
    }

    try {
      return route.render(payload);
    } catch (error) {
      LogEngine.error(`Error formatting ${type} event`, {
        error: error instanceof Error ? error.message : String(error)
      });
      return null;
    }
  }

  private static parse<S extends z.ZodTypeAny>(
    eventType: GitHubEventType,
    schema: S,
    payload: unknown,
    template: (event: z.output<S>) => string | null
  ): string | null {
    const result = schema.safeParse(payload);
    if (!result.success) {
      LogEngine.warn(`Malformed ${eventType} payload - notification skipped`, {
        issues: result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
      });
      return null;
    }
    return template(result.data);
  }

  static formatPush(event: PushEvent): string | null {
    const { commits } = event;
    if (commits.length === 0) {
      return null;
    }

    const branch = event.ref.startsWith('refs/heads/')
      ? event.ref.split('/').pop() ?? event.ref
      : event.ref;

    let message = `🚀 *Push to ${escapeMarkdown(event.repository.full_name)}*\n\n`;
    message += `🌿 *Branch:* ${escapeMarkdown(branch)}\n`;
    message += `👤 *Pusher:* ${escapeMarkdown(event.pusher.name)}\n`;
    message += `📝 *Commits:* ${commits.length}\n\n`;

    for (const commit of commits.slice(0, PUSH_COMMIT_PREVIEW)) {
      const sha = `\`${escapeMarkdownCode(commit.id.substring(0, 7))}\``;
      const shaRef = commit.url ? `[${sha}](${escapeMarkdownUrl(commit.url)})` : sha;

      message += `🔸 *${escapeMarkdown(commit.message)}*\n`;
      message += `👤 ${escapeMarkdown(commit.author.name)} • ${shaRef}\n\n`;
    }

    if (commits.length > PUSH_COMMIT_PREVIEW) {
      message += `\\.\\.\\. and ${commits.length - PUSH_COMMIT_PREVIEW} more commits\n\n`;
    }

    if (event.repository.html_url) {
      message += `🔗 ${markdownLink('View Repository', event.repository.html_url)}`;
    }

    return message;
  }

  static formatIssue(event: IssuesEvent): string {
    const { issue } = event;
    const icon = ISSUE_ACTION_ICONS[event.action] ?? DEFAULT_ACTION_ICON;

    let message = `${icon} *Issue ${escapeMarkdown(event.action)} in ${escapeMarkdown(event.repository.full_name)}*\n\n`;
    message += `🐛 *\\#${issue.number}: ${escapeMarkdown(issue.title)}*\n`;
    message += `👤 *By:* ${escapeMarkdown(issue.user.login)}\n`;

    if (issue.html_url) {
      message += `🔗 ${markdownLink('View Issue', issue.html_url)}`;
    }

    return message;
  }

  static formatPullRequest(event: PullRequestEvent): string {
    const pr = event.pull_request;
    const icon = PULL_REQUEST_ACTION_ICONS[event.action] ?? DEFAULT_ACTION_ICON;

    let message = `${icon} *Pull Request ${escapeMarkdown(event.action)} in ${escapeMarkdown(event.repository.full_name)}*\n\n`;
    message += `🔀 *\\#${pr.number}: ${escapeMarkdown(pr.title)}*\n`;
    message += `👤 *By:* ${escapeMarkdown(pr.user.login)}\n`;

    if (pr.html_url) {
      message += `🔗 ${markdownLink('View Pull Request', pr.html_url)}`;
    }

    return message;
  }

  static formatRelease(event: ReleaseEvent): string | null {
    if (event.action !== 'published') {
      return null;
    }

    const { release } = event;
    let message = `🎉 *New Release in ${escapeMarkdown(event.repository.full_name)}*\n\n`;
    message += `🏷️ *${escapeMarkdown(release.name)}* \\(${escapeMarkdown(release.tag_name)}\\)\n`;
    message += `👤 *By:* ${escapeMarkdown(release.author.login)}\n`;

    if (release.html_url) {
      message += `🔗 ${markdownLink('View Release', release.html_url)}`;
    }

    return message;
  }

  static formatPing(event: PingEvent): string {
    return `🏓 *Webhook configured for ${escapeMarkdown(event.repository.full_name)}*\n\nWebhook is working correctly\\!`;
  }
}
