import { Hono } from 'hono';
import { LogEngine } from '@wgtechlabs/log-engine';
import { getWebhookUrl, type AppConfig } from '../config/env.js';
import type { GitHubClient } from '../services/github.js';

/**
 * GitHub Telegram Relay - Status API
 *
 * JSON-only monitoring endpoints on their own listener:
 * - GET /health: liveness
 * - GET /api/status: poller state, GitHub connectivity and quota, configuration
 * - GET /api/config: configuration without secrets
 *
 * Tokens, the webhook secret and individual chat ids are never returned.
 *
 * @since 2025
 */

export interface StatusRouteDeps {
  config: AppConfig;
  github: Pick<GitHubClient, 'getRateLimit'>;
  isBotRunning: () => boolean;
  now?: () => Date;
}

function notificationSettings(config: AppConfig) {
  return {
    push: config.notifications.push,
    issues: config.notifications.issues,
    pull_requests: config.notifications.pullRequests,
    releases: config.notifications.releases
  };
}

export function getConfigInfo(config: AppConfig) {
  return {
    github_username: config.githubUsername,
    webhook_url: getWebhookUrl(config),
    allowed_chats_count: config.allowedChatIds.size,
    rate_limiting: {
      requests: config.rateLimit.requests,
      window: config.rateLimit.windowSeconds
    },
    notifications: notificationSettings(config)
  };
}

export function createStatusApp(deps: StatusRouteDeps): Hono {
  const { config, github, isBotRunning } = deps;
  const now = deps.now ?? (() => new Date());
  const app = new Hono();

  app.get('/health', (c) => c.json({ status: 'healthy', service: 'web_interface' }));

  app.get('/api/status', async (c) => {
    try {
      const rateLimit = await github.getRateLimit();

      return c.json({
        bot_running: isBotRunning(),
        timestamp: now().toISOString(),
        github_api: {
          connected: rateLimit !== null,
          rate_limit: rateLimit
        },
        configuration: {
          github_username: config.githubUsername,
          allowed_chats: config.allowedChatIds.size,
          rate_limit: `${config.rateLimit.requests}/${config.rateLimit.windowSeconds}s`,
          notifications: notificationSettings(config)
        }
      });
    } catch (error) {
      LogEngine.error('Error getting bot status', {
        error: error instanceof Error ? error.message : String(error)
      });
      return c.json({ error: 'Failed to get bot status', timestamp: now().toISOString() }, 500);
    }
  });

  app.get('/api/config', (c) => c.json(getConfigInfo(config)));

  return app;
}
