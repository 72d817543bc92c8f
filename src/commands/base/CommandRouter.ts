/**
 * Command Router
 *
 * Entry point for every incoming text message:
 *
 *   received → authorized? → rate checked? → dispatched to handler
 *
 * Denied messages get a short reply and never reach a handler. Unknown text
 * goes through the same gate before it is answered.
 */

import type { ICommand } from './BaseCommand.js'
import type { BotContext } from '../../types/index.js'
import type { RateLimitSettings } from '../../config/env.js'
import { COMMAND_KINDS, parseCommand, type CommandKind } from '../parser.js'
import { LogEngine } from '@wgtechlabs/log-engine'
import { safeReply } from '../../bot.js'
import { isChatAllowed } from '../../utils/permissions.js'
import type { SlidingWindowRateLimiter } from '../../utils/rateLimiter.js'

export const UNAUTHORIZED_MESSAGE = '❌ You are not authorized to use this bot.'
export const RATE_LIMITED_MESSAGE = '⏰ Rate limit exceeded. Please wait before making more requests.'

export type CommandTable = Record<CommandKind | 'unknown', ICommand>

export type RouteOutcome = 'handled' | 'unauthorized' | 'rate_limited' | 'ignored'

export interface CommandRouterOptions {
  allowedChatIds: ReadonlySet<number>
  rateLimit: RateLimitSettings
  rateLimiter: SlidingWindowRateLimiter
  /** Clock in milliseconds */
  now?: () => number
}

export class CommandRouter {
  private readonly now: () => number

  constructor(
    private readonly commands: CommandTable,
    private readonly options: CommandRouterOptions
  ) {
    this.now = options.now ?? Date.now
  }

  /**
   * Routes one incoming message. Updates without text or chat are ignored.
   */
  async route(ctx: BotContext): Promise<RouteOutcome> {
    const message = ctx.message
    const text = message && 'text' in message ? message.text : undefined
    const chatId = ctx.chat?.id

    if (text === undefined || chatId === undefined) {
      return 'ignored'
    }

    if (!isChatAllowed(chatId, this.options.allowedChatIds)) {
      LogEngine.warn('Unauthorized chat attempted to use the bot', {
        chatId,
        chatType: ctx.chat?.type,
      })
      await safeReply(ctx, UNAUTHORIZED_MESSAGE)
      return 'unauthorized'
    }

    const { requests, windowSeconds } = this.options.rateLimit
    if (!this.options.rateLimiter.allow(chatId, this.now(), requests, windowSeconds)) {
      LogEngine.warn('Rate limit exceeded', { chatId, requests, windowSeconds })
      await safeReply(ctx, RATE_LIMITED_MESSAGE)
      return 'rate_limited'
    }

    const parsed = parseCommand(text)
    if (parsed.kind === 'unknown') {
      LogEngine.debug('Unknown command received', { chatId, token: parsed.token })
    }

    await this.commands[parsed.kind].execute(ctx, parsed)
    return 'handled'
  }

  /**
   * Commands shown in /help and in the Telegram command menu, in menu order
   */
  getListedCommands(): ICommand[] {
    return COMMAND_KINDS
      .map(kind => this.commands[kind])
      .filter(command => command.metadata.listed !== false)
  }

  getStats(): { totalCommands: number; listedCommands: number } {
    return {
      totalCommands: COMMAND_KINDS.length,
      listedCommands: this.getListedCommands().length,
    }
  }
}
