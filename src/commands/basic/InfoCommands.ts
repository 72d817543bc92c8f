/**
 * Basic Information Commands
 *
 * /start, /help and /status.
 */

import { BaseCommand, type CommandMetadata, type ICommand } from '../base/BaseCommand.js';
import type { BotContext } from '../../types/index.js';
import type { NotifyFlags, RateLimitSettings } from '../../config/env.js';
import type { GitHubClient } from '../../services/github.js';
import { escapeMarkdown } from '../../utils/markdownEscape.js';
import { formatStatus } from '../../utils/messageFormatter.js';
import { getPackageInfo } from '../../utils/packageInfo.js';

export class StartCommand extends BaseCommand {
    readonly metadata: CommandMetadata = {
        name: 'start',
        description: 'Welcome message and bot introduction',
        usage: '/start'
    };

    protected async executeCommand(ctx: BotContext): Promise<void> {
        const welcomeMessage = '🎯 *Welcome to GitHub Telegram Relay\\!*\n\n' +
            'I post GitHub activity to this chat and look things up on GitHub for you\\.\n\n' +
            '*Profiles & discovery*\n' +
            '• /profile \\[username\\] \\- GitHub profile\n' +
            '• /repos \\[username\\] \\- recently updated repositories\n' +
            '• /search <query\\> \\- find repositories\n\n' +
            '*Repositories*\n' +
            '• /repo owner/repo \\- repository details\n' +
            '• /commits owner/repo \\- recent commits\n' +
            '• /issues owner/repo \\- open issues\n\n' +
            '*Notifications*\n' +
            'Pushes, issues, pull requests and releases from every repository whose webhook points here are posted automatically\\. See /watching\\.\n\n' +
            'Type /help for the full command list\\.';

        await this.replyMarkdown(ctx, welcomeMessage);
    }
}

export class HelpCommand extends BaseCommand {
    readonly metadata: CommandMetadata = {
        name: 'help',
        description: 'Show available commands',
        usage: '/help'
    };

    constructor(
        private readonly listCommands: () => ICommand[],
        private readonly rateLimit: RateLimitSettings
    ) {
        super();
    }

    protected async executeCommand(ctx: BotContext): Promise<void> {
        const lines = this.listCommands().map(command => `• ${command.generateHelp()}`);

        const helpMessage = '📋 Available Commands:\n\n' +
            `${lines.join('\n')}\n\n` +
            '💡 Tips:\n' +
            '• Use full repository names: owner/repository\n' +
            '• Commands work with any public GitHub repository\n' +
            '• Your own account is used when a username is omitted\n' +
            `• Rate limit: ${this.rateLimit.requests} requests per ${this.rateLimit.windowSeconds} seconds per chat`;

        await this.replyText(ctx, helpMessage);
    }
}

export interface StatusCommandDeps {
    github: Pick<GitHubClient, 'getRateLimit'>;
    rateLimit: RateLimitSettings;
    notifications: NotifyFlags;
}

export class StatusCommand extends BaseCommand {
    readonly metadata: CommandMetadata = {
        name: 'status',
        description: 'GitHub API quota and bot configuration',
        usage: '/status'
    };

    constructor(private readonly deps: StatusCommandDeps) {
        super();
    }

    protected async executeCommand(ctx: BotContext): Promise<void> {
        const rateLimit = await this.deps.github.getRateLimit();
        const { version } = getPackageInfo();

        const message = formatStatus({
            rateLimit,
            commandLimit: this.deps.rateLimit,
            notifications: this.deps.notifications
        }) + `\n_v${escapeMarkdown(version)}_`;

        await this.replyMarkdown(ctx, message);
    }
}
