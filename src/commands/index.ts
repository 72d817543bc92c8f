/**
 * Command System
 *
 * Builds the command table and the router in front of it. Each command kind
 * maps to exactly one handler; the compiler rejects a table with a kind missing.
 */

import { CommandRouter, type CommandTable } from './base/CommandRouter.js';
import type { AppConfig } from '../config/env.js';
import type { GitHubClient } from '../services/github.js';
import { LogEngine } from '@wgtechlabs/log-engine';
import { StartupLogger } from '../utils/logConfig.js';
import { SlidingWindowRateLimiter } from '../utils/rateLimiter.js';

// Basic commands
import { HelpCommand, StartCommand, StatusCommand } from './basic/InfoCommands.js';
import { UnwatchCommand, WatchCommand, WatchingCommand } from './basic/WatchCommands.js';
import { UnknownCommand } from './basic/UnknownCommand.js';

// GitHub lookups
import {
    CommitsCommand,
    IssuesCommand,
    ProfileCommand,
    RepoCommand,
    ReposCommand,
    SearchCommand
} from './github/GitHubCommands.js';

export interface CommandSystemDeps {
    config: Pick<AppConfig, 'allowedChatIds' | 'rateLimit' | 'notifications'>;
    github: GitHubClient;
    rateLimiter?: SlidingWindowRateLimiter;
    now?: () => number;
}

/**
 * Initialize all commands and return the router that dispatches to them
 */
export function createCommandRouter(deps: CommandSystemDeps): CommandRouter {
    const { config, github } = deps;
    LogEngine.info('🚀 Initializing command system...');

    // Help lists the router's commands, which only exist once the router does
    let router: CommandRouter | null = null;
    const listCommands = () => router?.getListedCommands() ?? [];

    const commands: CommandTable = {
        start: new StartCommand(),
        help: new HelpCommand(listCommands, config.rateLimit),
        profile: new ProfileCommand(github),
        repos: new ReposCommand(github),
        repo: new RepoCommand(github),
        commits: new CommitsCommand(github),
        issues: new IssuesCommand(github),
        search: new SearchCommand(github),
        status: new StatusCommand({
            github,
            rateLimit: config.rateLimit,
            notifications: config.notifications
        }),
        watch: new WatchCommand(),
        unwatch: new UnwatchCommand(),
        watching: new WatchingCommand(config.notifications, config.allowedChatIds),
        unknown: new UnknownCommand()
    };

    router = new CommandRouter(commands, {
        allowedChatIds: config.allowedChatIds,
        rateLimit: config.rateLimit,
        rateLimiter: deps.rateLimiter ?? new SlidingWindowRateLimiter(),
        now: deps.now
    });

    for (const command of Object.values(commands)) {
        StartupLogger.logCommandRegistration(command.metadata.name, {
            listed: command.metadata.listed !== false
        });
    }
    StartupLogger.showCommandRegistrationSummary();

    LogEngine.info('✅ Command system initialized', router.getStats());
    return router;
}

/**
 * Entries for Telegram's command menu (setMyCommands)
 */
export function getBotCommandMenu(router: CommandRouter): Array<{ command: string; description: string }> {
    return router.getListedCommands().map(command => ({
        command: command.metadata.name,
        description: command.metadata.description
    }));
}

export { CommandRouter };
export type { RouteOutcome } from './base/CommandRouter.js';
