/**
 * Unit tests for commands/base/CommandRouter.ts
 */
import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { BotContext } from '../types/index.js';
import type { ICommand } from '../commands/base/BaseCommand.js';
import {
  CommandRouter,
  RATE_LIMITED_MESSAGE,
  UNAUTHORIZED_MESSAGE,
  type CommandTable
} from '../commands/base/CommandRouter.js';
import { COMMAND_KINDS, type CommandKind } from '../commands/parser.js';
import { SlidingWindowRateLimiter } from '../utils/rateLimiter.js';

vi.mock('@wgtechlabs/log-engine', () => ({
  LogEngine: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn()
  }
}));

function fakeCommand(name: CommandKind | 'unknown', listed?: boolean): ICommand {
  return {
    metadata: { name, description: `${name} description`, usage: `/${name}`, listed },
    execute: vi.fn().mockResolvedValue(undefined),
    generateHelp: () => `/${name}`
  };
}

function makeTable(): CommandTable {
  const entries = COMMAND_KINDS.map(kind => [kind, fakeCommand(kind)] as const);
  return {
    ...Object.fromEntries(entries),
    unknown: fakeCommand('unknown', false)
  } as CommandTable;
}

function makeContext(text: string | undefined, chatId: number | null = 100) {
  const reply = vi.fn().mockResolvedValue({ message_id: 2 });
  const ctx = {
    chat: chatId === null ? undefined : { id: chatId, type: 'private' },
    message: text === undefined ? { message_id: 1 } : { message_id: 1, text },
    reply
  } as unknown as BotContext;
  return { ctx, reply };
}

describe('CommandRouter', () => {
  let commands: CommandTable;
  let limiter: SlidingWindowRateLimiter;
  let clock: number;

  beforeEach(() => {
    vi.clearAllMocks();
    commands = makeTable();
    limiter = new SlidingWindowRateLimiter();
    clock = 1_000_000;
  });

  function makeRouter(allowed: number[] = [], requests = 10) {
    return new CommandRouter(commands, {
      allowedChatIds: new Set(allowed),
      rateLimit: { requests, windowSeconds: 60 },
      rateLimiter: limiter,
      now: () => clock
    });
  }

  it('should dispatch a known command with its parsed arguments', async () => {
    const router = makeRouter();
    const { ctx } = makeContext('/repo octocat/hello-world');

    await expect(router.route(ctx)).resolves.toBe('handled');
    expect(commands.repo.execute).toHaveBeenCalledWith(ctx, {
      kind: 'repo',
      args: ['octocat/hello-world'],
      argText: 'octocat/hello-world'
    });
    expect(commands.repos.execute).not.toHaveBeenCalled();
  });

  it('should send unrecognised text to the unknown handler', async () => {
    const router = makeRouter();
    const { ctx } = makeContext('hello there');

    await expect(router.route(ctx)).resolves.toBe('handled');
    expect(commands.unknown.execute).toHaveBeenCalledTimes(1);
  });

  it('should refuse chats outside the allow-list', async () => {
    const router = makeRouter([1, 2]);
    const { ctx, reply } = makeContext('/help', 3);

    await expect(router.route(ctx)).resolves.toBe('unauthorized');
    expect(reply).toHaveBeenCalledWith(UNAUTHORIZED_MESSAGE, {});
    expect(commands.help.execute).not.toHaveBeenCalled();
    expect(limiter.getCount(3)).toBe(0);
  });

  it('should admit listed chats', async () => {
    const router = makeRouter([1, -2]);
    const { ctx } = makeContext('/help', -2);

    await expect(router.route(ctx)).resolves.toBe('handled');
  });

  it('should throttle a chat that exceeds its rate limit', async () => {
    const router = makeRouter([], 2);

    await router.route(makeContext('/help').ctx);
    await router.route(makeContext('/status').ctx);
    const { ctx, reply } = makeContext('/profile');

    await expect(router.route(ctx)).resolves.toBe('rate_limited');
    expect(reply).toHaveBeenCalledWith(RATE_LIMITED_MESSAGE, {});
    expect(commands.profile.execute).not.toHaveBeenCalled();
  });

  it('should count unknown text against the rate limit', async () => {
    const router = makeRouter([], 1);

    await router.route(makeContext('not a command').ctx);

    await expect(router.route(makeContext('/help').ctx)).resolves.toBe('rate_limited');
  });

  it('should admit a throttled chat again after the window passes', async () => {
    const router = makeRouter([], 1);
    await router.route(makeContext('/help').ctx);

    clock += 60_000;

    await expect(router.route(makeContext('/help').ctx)).resolves.toBe('handled');
  });

  it('should ignore updates without text or chat', async () => {
    const router = makeRouter();

    await expect(router.route(makeContext(undefined).ctx)).resolves.toBe('ignored');
    await expect(router.route(makeContext('/help', null).ctx)).resolves.toBe('ignored');
  });

  it('should list visible commands in menu order', () => {
    const router = makeRouter();

    expect(router.getListedCommands().map(command => command.metadata.name)).toEqual([...COMMAND_KINDS]);
    expect(router.getStats()).toEqual({ totalCommands: 12, listedCommands: 12 });
  });
});
