import { Hono } from 'hono';
import { LogEngine } from '@wgtechlabs/log-engine';
import type { AppConfig } from '../../config/env.js';
import { EventFormatter } from './EventFormatter.js';
import { verifySignature } from './SignatureVerifier.js';

/**
 * GitHub Telegram Relay - Webhook Intake
 *
 * `POST /webhook` verifies the delivery against the raw body, parses it,
 * formats a notification and hands it to the dispatcher without waiting for
 * Telegram. Duplicate deliveries are processed again; nothing is de-duplicated.
 *
 * Responses:
 * - 200 {"status":"success"}: accepted (whether or not a message was produced)
 * - 403 {"error":"Invalid signature"}
 * - 400 {"error":"Invalid JSON"}
 * - 500 {"error":"Internal server error"}
 *
 * @since 2025
 */

export interface NotificationSink {
  dispatch(message: string, targets: readonly number[]): void;
}

export interface WebhookServerDeps {
  config: Pick<AppConfig, 'webhookSecret' | 'allowedChatIds' | 'notifications'>;
  dispatcher: NotificationSink;
}

export function createWebhookApp(deps: WebhookServerDeps): Hono {
  const { config, dispatcher } = deps;
  const app = new Hono();

  app.post('/webhook', async (c) => {
    const eventType = c.req.header('x-github-event');
    const deliveryId = c.req.header('x-github-delivery') ?? 'unknown';
    const signature = c.req.header('x-hub-signature-256');

    // The HMAC covers the exact bytes GitHub sent, so read the body before parsing
    const rawBody = await c.req.text();

    if (!config.webhookSecret) {
      LogEngine.warn('No webhook secret configured, skipping signature verification', { deliveryId });
    }

    if (!(await verifySignature(config.webhookSecret, rawBody, signature))) {
      LogEngine.warn('Invalid webhook signature', {
        deliveryId,
        eventType,
        hasSignature: signature !== undefined
      });
      return c.json({ error: 'Invalid signature' }, 403);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(rawBody);
    } catch (error) {
      LogEngine.warn('Invalid JSON payload', {
        deliveryId,
        error: error instanceof Error ? error.message : String(error)
      });
      return c.json({ error: 'Invalid JSON' }, 400);
    }

    const message = EventFormatter.format(eventType, payload, config.notifications);
    if (message) {
      dispatcher.dispatch(message, [...config.allowedChatIds]);
    }

    LogEngine.info('Webhook processed', { deliveryId, eventType, notified: message !== null });
    return c.json({ status: 'success' }, 200);
  });

  app.get('/health', (c) => c.json({ status: 'healthy', service: 'webhook_handler' }));

  app.onError((error, c) => {
    LogEngine.error('Error processing webhook', {
      error: error.message,
      path: c.req.path,
      method: c.req.method
    });
    return c.json({ error: 'Internal server error' }, 500);
  });

  return app;
}
