/**
 * Unit tests for commands/basic/InfoCommands.ts
 */
import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { BotContext } from '../types/index.js';
import type { ICommand } from '../commands/base/BaseCommand.js';
import { HelpCommand, StartCommand, StatusCommand } from '../commands/basic/InfoCommands.js';

vi.mock('@wgtechlabs/log-engine', () => ({
  LogEngine: {
    debug: vi.fn(),
    error: vi.fn(),
    info: vi.fn(),
    warn: vi.fn()
  }
}));

vi.mock('../utils/packageInfo.js', () => ({
  getPackageInfo: vi.fn(() => ({ name: 'github-telegram-relay', version: '1.0.0' }))
}));

const NO_ARGS = { args: [], argText: '' };
const MARKDOWN = { parse_mode: 'MarkdownV2' };

function makeContext() {
  const reply = vi.fn().mockResolvedValue({ message_id: 2 });
  const ctx = { chat: { id: 456, type: 'private' }, reply } as unknown as BotContext;
  return { ctx, reply };
}

function helpEntry(line: string): ICommand {
  return {
    metadata: { name: 'start', description: '', usage: '' },
    execute: vi.fn(),
    generateHelp: () => line
  };
}

describe('InfoCommands', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('StartCommand', () => {
    it('should send an escaped MarkdownV2 welcome', async () => {
      const { ctx, reply } = makeContext();

      await new StartCommand().execute(ctx, NO_ARGS);

      expect(reply).toHaveBeenCalledTimes(1);
      const [text, options] = reply.mock.calls[0] ?? [];
      expect(options).toEqual(MARKDOWN);
      expect(String(text).startsWith('🎯 *Welcome to GitHub Telegram Relay\\!*\n\n')).toBe(true);
      expect(String(text).endsWith('Type /help for the full command list\\.')).toBe(true);
    });
  });

  describe('HelpCommand', () => {
    it('should list commands and tips as plain text', async () => {
      const { ctx, reply } = makeContext();
      const command = new HelpCommand(
        () => [helpEntry('/start - Welcome'), helpEntry('/help - Show help')],
        { requests: 5, windowSeconds: 30 }
      );

      await command.execute(ctx, NO_ARGS);

      expect(reply).toHaveBeenCalledWith(
        '📋 Available Commands:\n\n' +
        '• /start - Welcome\n' +
        '• /help - Show help\n\n' +
        '💡 Tips:\n' +
        '• Use full repository names: owner/repository\n' +
        '• Commands work with any public GitHub repository\n' +
        '• Your own account is used when a username is omitted\n' +
        '• Rate limit: 5 requests per 30 seconds per chat',
        {}
      );
    });
  });

  describe('StatusCommand', () => {
    it('should report the GitHub quota, configuration and version', async () => {
      const { ctx, reply } = makeContext();
      const getRateLimit = vi.fn().mockResolvedValue(null);
      const command = new StatusCommand({
        github: { getRateLimit },
        rateLimit: { requests: 10, windowSeconds: 60 },
        notifications: { push: true, issues: true, pullRequests: true, releases: true }
      });

      await command.execute(ctx, NO_ARGS);

      expect(getRateLimit).toHaveBeenCalledTimes(1);
      expect(reply).toHaveBeenCalledWith(
        '📊 *Bot Status*\n\n' +
        '🤖 *Bot:* Running\n' +
        '🔧 *GitHub API:* Unavailable\n' +
        '\n⚙️ *Configuration:*\n' +
        '• Rate limit: 10 req/60s\n' +
        '• Notifications: push on, issues on, pull requests on, releases on\n' +
        '\n_v1\\.0\\.0_',
        MARKDOWN
      );
    });
  });
});
