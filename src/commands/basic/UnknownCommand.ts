import { BaseCommand, type CommandMetadata } from '../base/BaseCommand.js';
import type { BotContext } from '../../types/index.js';

export const UNKNOWN_COMMAND_MESSAGE = '❌ Unknown command. Use /help to see available commands.';

/**
 * Answers any text that is not a known command.
 */
export class UnknownCommand extends BaseCommand {
    readonly metadata: CommandMetadata = {
        name: 'unknown',
        description: 'Fallback for unrecognised text',
        usage: '',
        listed: false
    };

    protected async executeCommand(ctx: BotContext): Promise<void> {
        await this.replyText(ctx, UNKNOWN_COMMAND_MESSAGE);
    }
}
