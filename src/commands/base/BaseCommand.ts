/**
 * Base Command
 *
 * Every bot command runs through {@link BaseCommand.execute}: it logs the call,
 * runs the command body and turns any unexpected failure into a logged error
 * with an id and a generic apology to the chat. Authorization and rate limiting
 * happen earlier, in the router.
 */

import type { BotContext } from '../../types/index.js';
import type { CommandInput, CommandKind } from '../parser.js';
import { LogEngine } from '@wgtechlabs/log-engine';
import { safeReply } from '../../bot.js';

export interface CommandMetadata {
    name: CommandKind | 'unknown';
    description: string;
    usage: string;
    examples?: string[];
    /** Listed in the Telegram command menu and /help */
    listed?: boolean;
}

export interface ICommand {
    metadata: CommandMetadata;
    execute(ctx: BotContext, input: CommandInput): Promise<void>;
    generateHelp(): string;
}

export const GENERIC_ERROR_MESSAGE = '❌ An error occurred while processing your request. Please try again later.';

export abstract class BaseCommand implements ICommand {
    abstract readonly metadata: CommandMetadata;

    /**
     * Template method for command execution
     */
    async execute(ctx: BotContext, input: CommandInput): Promise<void> {
        const startTime = Date.now();

        try {
            LogEngine.info(`Executing command: ${this.metadata.name}`, {
                chatId: ctx.chat?.id,
                chatType: ctx.chat?.type,
                command: this.metadata.name,
                argCount: input.args.length
            });

            await this.executeCommand(ctx, input);

            LogEngine.info(`Command completed: ${this.metadata.name}`, {
                chatId: ctx.chat?.id,
                executionTime: Date.now() - startTime
            });

        } catch (error) {
            await this.handleError(ctx, error);
        }
    }

    /**
     * Command-specific execution logic (implemented by subclasses)
     */
    protected abstract executeCommand(ctx: BotContext, input: CommandInput): Promise<void>;

    /**
     * Replies with MarkdownV2; the text must already be escaped.
     */
    protected async replyMarkdown(ctx: BotContext, text: string): Promise<void> {
        await safeReply(ctx, text, { parse_mode: 'MarkdownV2' });
    }

    /**
     * Replies with plain text, for usage hints and failures that echo user input.
     */
    protected async replyText(ctx: BotContext, text: string): Promise<void> {
        await safeReply(ctx, text);
    }

    /**
     * Centralized error handling
     */
    protected async handleError(ctx: BotContext, error: unknown): Promise<void> {
        const errorId = Date.now().toString(36);

        LogEngine.error(`Command error: ${this.metadata.name}`, {
            errorId,
            command: this.metadata.name,
            error: error instanceof Error ? error.message : String(error),
            chatId: ctx.chat?.id,
            stack: error instanceof Error ? error.stack : undefined
        });

        await this.replyText(ctx, `${GENERIC_ERROR_MESSAGE}\n\nError ID: ${errorId}`);
    }

    /**
     * Generate help text for this command (plain text)
     */
    public generateHelp(): string {
        let help = `${this.metadata.usage} - ${this.metadata.description}`;

        if (this.metadata.examples?.length) {
            help += `\n   e.g. ${this.metadata.examples.join(', ')}`;
        }

        return help;
    }
}
