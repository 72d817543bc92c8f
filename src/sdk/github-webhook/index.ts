/**
 * GitHub Telegram Relay - GitHub Webhook SDK
 *
 * Receives GitHub webhook deliveries and turns them into Telegram notifications.
 *
 * Core Components:
 * - verifySignature: X-Hub-Signature-256 check over the raw body
 * - EventFormatter: payload → MarkdownV2 message, or nothing
 * - createWebhookApp: Hono app exposing POST /webhook and GET /health
 *
 * Usage Example:
 * ```typescript
 * import { createWebhookApp } from './github-webhook/index.js';
 *
 * const app = createWebhookApp({ config, dispatcher });
 * await startHttpServer('Webhook server', app, config.webhookHost, config.webhookPort);
 * ```
 *
 * @since 2025
 */

export { verifySignature } from './SignatureVerifier.js';
export { EventFormatter } from './EventFormatter.js';
export { createWebhookApp } from './WebhookServer.js';
export type { NotificationSink, WebhookServerDeps } from './WebhookServer.js';
