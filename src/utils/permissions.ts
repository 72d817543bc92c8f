/**
 * Chat Authorization
 *
 * The allow-list comes from ALLOWED_CHAT_IDS and is built once at startup.
 * An empty list admits every chat.
 */

/**
 * Returns whether a chat may use the bot.
 */
export function isChatAllowed(chatId: number, allowList: ReadonlySet<number>): boolean {
    if (allowList.size === 0) {
        return true;
    }
    return allowList.has(chatId);
}
