/**
 * Core Bot Utilities - Bot lifecycle and safe message operations
 *
 * Key Features:
 * - Bot instance creation and configuration
 * - Safe replies and sends that classify Telegram failures
 * - Adapters that let the dispatcher and the poll loop talk to Telegram
 *
 * @since 2025
 */
import { Telegraf, TelegramError } from 'telegraf';
import type { Telegram } from 'telegraf';
import type { Message, Update } from 'telegraf/types';
import { LogEngine } from '@wgtechlabs/log-engine';
import type { UpdateSource } from './handlers/updatePoller.js';
import type { MessageSender } from './services/notificationDispatcher.js';
import type { BotContext } from './types/index.js';

type SendExtra = Parameters<Telegram['sendMessage']>[2];

/** Outbound Telegram calls are abandoned after this long */
export const TELEGRAM_SEND_TIMEOUT_MS = 15_000;

/**
 * Creates a new Telegraf bot instance
 *
 * @param token - Telegram Bot API token
 * @returns Initialized bot instance
 */
export function createBot(token: string): Telegraf<BotContext> {
    if (!token) {
        throw new Error('Telegram bot token is required');
    }
    return new Telegraf<BotContext>(token);
}

/**
 * How a failed Telegram call should be treated
 *
 * - blocked / chat_not_found: the chat cannot receive messages; warn and move on
 * - rate_limited: Telegram asked us to slow down; warn and move on
 * - other: a real failure; log and rethrow
 */
export type TelegramFailure = 'blocked' | 'chat_not_found' | 'rate_limited' | 'other';

export function classifyTelegramError(error: unknown): TelegramFailure {
    if (!(error instanceof TelegramError)) {
        return 'other';
    }

    if (error.code === 403 && error.description.includes('bot was blocked by the user')) {
        return 'blocked';
    }
    if ((error.code === 403 || error.code === 400) && error.description.includes('chat not found')) {
        return 'chat_not_found';
    }
    if (error.code === 429) {
        return 'rate_limited';
    }
    return 'other';
}

/**
 * Rejects if the promise does not settle within `ms`.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, operation: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => reject(new Error(`${operation} timed out after ${ms}ms`)), ms);
    });

    try {
        return await Promise.race([promise, timeout]);
    } finally {
        clearTimeout(timer);
    }
}

/**
 * Logs a handled Telegram failure. Returns false when the failure must propagate.
 */
function handleTelegramFailure(error: unknown, operation: string, chatId: number | undefined): boolean {
    const failure = classifyTelegramError(error);

    switch (failure) {
        case 'blocked':
            LogEngine.warn(`Bot was blocked by user during ${operation}`, { chatId });
            return true;
        case 'chat_not_found':
            LogEngine.warn(`Chat not found during ${operation}`, { chatId });
            return true;
        case 'rate_limited':
            LogEngine.warn(`Rate limit exceeded during ${operation}`, {
                chatId,
                retryAfter: error instanceof TelegramError ? error.parameters?.retry_after : undefined
            });
            return true;
        case 'other':
            LogEngine.error(`Error during ${operation}`, {
                error: error instanceof Error ? error.message : String(error),
                chatId
            });
            return false;
    }
}

/**
 * Replies to a message in the given context, handling errors such as blocked users, missing chats, and rate limits.
 *
 * @returns The sent message, or null if the reply could not be sent due to blocking, a missing chat, or rate limiting
 * @throws Any other Telegram or network error
 */
export async function safeReply(
    ctx: BotContext,
    text: string,
    options: SendExtra = {}
): Promise<Message.TextMessage | null> {
    try {
        return await withTimeout(ctx.reply(text, options), TELEGRAM_SEND_TIMEOUT_MS, 'reply');
    } catch (error) {
        if (handleTelegramFailure(error, 'reply', ctx.chat?.id)) {
            return null;
        }
        throw error;
    }
}

/**
 * Sends a message to a chat by id with the same failure handling as {@link safeReply}.
 *
 * @returns true when Telegram accepted the message, false when the failure was handled
 */
export async function safeSendMessage(
    telegram: Telegram,
    chatId: number,
    text: string,
    options: SendExtra = {}
): Promise<boolean> {
    try {
        await withTimeout(telegram.sendMessage(chatId, text, options), TELEGRAM_SEND_TIMEOUT_MS, 'sendMessage');
        return true;
    } catch (error) {
        if (handleTelegramFailure(error, 'sendMessage', chatId)) {
            return false;
        }
        throw error;
    }
}

/**
 * Notification sender backed by the bot's Telegram client. Messages are MarkdownV2.
 */
export function createTelegramSender(telegram: Telegram): MessageSender {
    return {
        sendMessage: (chatId, text) => safeSendMessage(telegram, chatId, text, { parse_mode: 'MarkdownV2' })
    };
}

/**
 * Long-poll update source over `getUpdates`.
 */
export function createUpdateSource(telegram: Telegram): UpdateSource<Update> {
    return {
        getUpdates: (offset, timeoutSeconds) => telegram.getUpdates(timeoutSeconds, 100, offset, ['message'])
    };
}
