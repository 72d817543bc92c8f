/**
 * GitHub Telegram Relay - Main Application Entry Point
 *
 * Relays GitHub repository events to Telegram chats and answers Telegram
 * commands by querying the GitHub API.
 *
 * Architecture:
 * - Webhook listener: verifies and formats GitHub deliveries, hands them to the dispatcher
 * - Notification dispatcher: detached fan-out to every allowed chat
 * - Update poller: long-polls Telegram and feeds updates through Telegraf to the command router
 * - Command router: authorization, per-chat rate limiting, command handlers
 * - Status API: JSON health and configuration endpoints
 *
 * @since 2025
 */
import dotenv from 'dotenv';

// Load environment variables from .env file
dotenv.config();

// Configure LogEngine format before any logging
import { LogEngine } from './config/logging.js';

// Validate environment configuration before proceeding
import { validateEnvironment } from './config/env.js';
const config = validateEnvironment();

import { createBot, createTelegramSender, createUpdateSource, classifyTelegramError } from './bot.js';
import { createCommandRouter, getBotCommandMenu } from './commands/index.js';
import { UpdatePoller } from './handlers/updatePoller.js';
import { createWebhookApp } from './sdk/github-webhook/index.js';
import { GitHubClient } from './services/github.js';
import { NotificationDispatcher } from './services/notificationDispatcher.js';
import { startHttpServer, type HttpListener } from './utils/httpServer.js';
import { initializeLogConfig, StartupLogger } from './utils/logConfig.js';
import { getPackageInfo } from './utils/packageInfo.js';
import { createStatusApp } from './web/statusRoutes.js';
import type { BotContext } from './types/index.js';

initializeLogConfig(config.environment, config.logLevel);
const packageInfo = getPackageInfo();
StartupLogger.logPackageInfo(packageInfo);

/**
 * Core services
 */
const bot = createBot(config.telegramToken);
const github = new GitHubClient(config.githubToken);
const dispatcher = new NotificationDispatcher(createTelegramSender(bot.telegram));
const router = createCommandRouter({ config, github });

/**
 * Global middleware for logging incoming messages
 */
bot.use(async (ctx: BotContext, next) => {
    if (ctx.message) {
        LogEngine.debug('Message received', {
            chatId: ctx.chat?.id,
            hasText: 'text' in ctx.message,
            isCommand: 'text' in ctx.message && ctx.message.text.startsWith('/')
        });
    }
    await next();
});

/**
 * Every text message goes through the router (authorization → rate limit → command)
 */
bot.use(async (ctx: BotContext) => {
    const outcome = await router.route(ctx);
    if (outcome !== 'handled' && outcome !== 'ignored') {
        LogEngine.debug('Message rejected by command gate', { chatId: ctx.chat?.id, outcome });
    }
});

/**
 * Last-resort handler for anything a command did not catch
 */
bot.catch((error: unknown, ctx: BotContext) => {
    const failure = classifyTelegramError(error);
    if (failure !== 'other') {
        LogEngine.warn('Telegram refused a message', { failure, chatId: ctx.chat?.id });
        return;
    }

    LogEngine.error('Unhandled Telegram error', {
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
        chatId: ctx.chat?.id,
        updateId: ctx.update.update_id
    });
});

const poller = new UpdatePoller(
    createUpdateSource(bot.telegram),
    update => bot.handleUpdate(update)
);

/**
 * Bot initialization and startup
 */
bot.botInfo = await bot.telegram.getMe();

// getUpdates is refused while a webhook is registered for the bot
await bot.telegram.deleteWebhook();

// Set bot commands for Telegram UI
await bot.telegram.setMyCommands(getBotCommandMenu(router));

LogEngine.info('Bot initialized successfully', {
    username: bot.botInfo.username,
    botId: bot.botInfo.id,
    version: packageInfo.version,
    nodeVersion: process.version,
    platform: process.platform
});

const listeners: HttpListener[] = [];

listeners.push(await startHttpServer(
    'Webhook server',
    createWebhookApp({ config, dispatcher }),
    config.webhookHost,
    config.webhookPort
));
StartupLogger.logListener(`webhook ${config.webhookHost}:${config.webhookPort}`);

listeners.push(await startHttpServer(
    'Status API',
    createStatusApp({ config, github, isBotRunning: () => poller.getStatus().isRunning }),
    config.webHost,
    config.webPort
));
StartupLogger.logListener(`status ${config.webHost}:${config.webPort}`);

/**
 * Start polling for updates
 */
poller.start();

StartupLogger.showStartupSummary({
    allowedChats: config.allowedChatIds.size,
    verifiesSignatures: config.webhookSecret.length > 0
});

let shuttingDown = false;

/**
 * Stops polling, closes both listeners and waits for in-flight notifications before exiting.
 */
async function gracefulShutdown(signal: string): Promise<void> {
    if (shuttingDown) {
        return;
    }
    shuttingDown = true;
    LogEngine.info(`Received ${signal}, shutting down gracefully...`);

    try {
        await poller.stop();
        await Promise.all(listeners.map(listener => listener.close()));

        if (dispatcher.pendingCount > 0) {
            LogEngine.info('Waiting for pending notifications', { pending: dispatcher.pendingCount });
        }
        await dispatcher.drain();

        LogEngine.info('Shutdown complete');
        process.exit(0);
    } catch (error) {
        LogEngine.error('Error during shutdown', {
            error: error instanceof Error ? error.message : String(error)
        });
        process.exit(1);
    }
}

/**
 * Signal handlers for graceful shutdown
 */
process.on('SIGINT', () => {
    void gracefulShutdown('SIGINT');
});

process.on('SIGTERM', () => {
    void gracefulShutdown('SIGTERM');
});
