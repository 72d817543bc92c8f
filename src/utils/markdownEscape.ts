/**
 * Markdown Escape Utilities
 *
 * Provides safe text escaping for Telegram MarkdownV2 formatting.
 * Every piece of text that comes from GitHub (titles, names, commit
 * messages, search queries) passes through here before it reaches a
 * message template.
 */

/**
 * Escapes special MarkdownV2 characters in user-provided text
 *
 * Each of _ * [ ] ( ) ~ ` > # + - = | { } . ! and the backslash itself
 * gets one preceding backslash. Nothing else changes.
 *
 * @param text - The text to escape
 * @returns Safely escaped text for use in MarkdownV2 messages
 *
 * @example
 * ```typescript
 * const title = "Fix *bold* parsing (v1.2)";
 * const message = `*Issue:* ${escapeMarkdown(title)}`;
 * // *Issue:* Fix \*bold\* parsing \(v1\.2\)
 * ```
 */
export function escapeMarkdown(text: string | null | undefined): string {
    if (!text) {
        return '';
    }

    const markdownChars = /[\\*_`\[\]()~>#+=|\{\}.!-]/g;
    return text.replace(markdownChars, (char) => `\\${char}`);
}

/**
 * Escapes a URL for the target part of an inline link, `[label](url)`.
 * Inside the parentheses MarkdownV2 only treats `)` and `\` as special.
 */
export function escapeMarkdownUrl(url: string): string {
    return url.replace(/[)\\]/g, (char) => `\\${char}`);
}

/**
 * Escapes text for use inside an inline code span
 */
export function escapeMarkdownCode(text: string): string {
    return text.replace(/[`\\]/g, (char) => `\\${char}`);
}

/**
 * Builds an inline link with an escaped label and target
 */
export function markdownLink(label: string, url: string): string {
    return `[${escapeMarkdown(label)}](${escapeMarkdownUrl(url)})`;
}

/**
 * Truncates text safely and adds ellipsis if needed
 *
 * @param text - The text to truncate
 * @param maxLength - Maximum length before truncation (default: 100)
 * @returns Truncated text with ellipsis if needed
 */
export function truncateText(text: string, maxLength: number = 100): string {
    if (!text) {
        return '';
    }

    if (text.length <= maxLength) {
        return text;
    }

    return text.substring(0, maxLength - 3) + '...';
}
