/**
 * Watch Commands
 *
 * Notifications are broadcast: every allowed chat receives every event from
 * every repository whose webhook points at this bot. There are no per-chat
 * watch lists, so /watch and /unwatch explain that instead of changing state,
 * and /watching reports what the broadcast currently covers.
 */

import { BaseCommand, type CommandMetadata } from '../base/BaseCommand.js';
import type { BotContext } from '../../types/index.js';
import type { NotifyFlags } from '../../config/env.js';
import type { CommandInput } from '../parser.js';

const BROADCAST_EXPLANATION =
    'Notifications are broadcast to every allowed chat for each repository whose ' +
    'GitHub webhook points at this bot. Per-chat watch lists are not kept.';

export class WatchCommand extends BaseCommand {
    readonly metadata: CommandMetadata = {
        name: 'watch',
        description: 'How to receive notifications for a repository',
        usage: '/watch owner/repo'
    };

    protected async executeCommand(ctx: BotContext, input: CommandInput): Promise<void> {
        const target = input.args[0] ?? 'a repository';
        await this.replyText(ctx,
            `📢 ${BROADCAST_EXPLANATION}\n\n` +
            `To get notifications for ${target}, add a webhook in its GitHub settings ` +
            '(Settings → Webhooks) pointing at this bot\'s /webhook endpoint with content type application/json.'
        );
    }
}

export class UnwatchCommand extends BaseCommand {
    readonly metadata: CommandMetadata = {
        name: 'unwatch',
        description: 'How to stop notifications for a repository',
        usage: '/unwatch owner/repo'
    };

    protected async executeCommand(ctx: BotContext, input: CommandInput): Promise<void> {
        const target = input.args[0] ?? 'a repository';
        await this.replyText(ctx,
            `🔕 ${BROADCAST_EXPLANATION}\n\n` +
            `To stop notifications for ${target}, remove or disable its webhook in the GitHub settings.`
        );
    }
}

export class WatchingCommand extends BaseCommand {
    readonly metadata: CommandMetadata = {
        name: 'watching',
        description: 'Show which events are relayed and to how many chats',
        usage: '/watching'
    };

    constructor(
        private readonly notifications: NotifyFlags,
        private readonly allowedChatIds: ReadonlySet<number>
    ) {
        super();
    }

    protected async executeCommand(ctx: BotContext): Promise<void> {
        const enabled = [
            this.notifications.push ? 'pushes' : null,
            this.notifications.issues ? 'issues' : null,
            this.notifications.pullRequests ? 'pull requests' : null,
            this.notifications.releases ? 'releases' : null
        ].filter((name): name is string => name !== null);

        const events = enabled.length > 0 ? enabled.join(', ') : 'none (webhook pings only)';

        await this.replyText(ctx,
            `👀 ${BROADCAST_EXPLANATION}\n\n` +
            `Relayed events: ${events}\n` +
            `Receiving chats: ${this.allowedChatIds.size}`
        );
    }
}
