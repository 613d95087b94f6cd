import type { Context } from 'telegraf'

import { Telegraf } from 'telegraf'
import { message } from 'telegraf/filters'

import type { BotConfig } from '../config/types'
import type { DayBucket } from '../domain/types'
import type { ConversationManager } from '../services/conversation/interfaces'
import type { LedgerService } from '../services/ledger/interfaces'

import { CALLBACK_DATA_CATEGORY_PREFIX, CONVERSATION_CLEANUP_INTERVAL_MS } from '../constants'
import { Command, ConversationStatus } from '../constants/types'
import { ExpenseValidationError } from '../domain/errors'
import { createLogger } from '../utils/logger'
import { parseExpenseMessage } from './expense-parser'
import { UIFormatter, WELCOME_MESSAGE } from './ui-formatter'

const logger = createLogger('ExpenseBot')

const GENERIC_FAILURE_MESSAGE = '⚠️ Something went wrong while saving. Please try again.'

/**
 * The part of a Telegraf context the handlers use. Every update context Telegraf passes satisfies it.
 */
export interface ChatContext {
  answerCbQuery: () => Promise<unknown>
  callbackQuery?: Context['callbackQuery']
  editMessageText: (text: string, extra?: Parameters<Context['editMessageText']>[1]) => Promise<unknown>
  from?: Context['from']
  reply: (text: string, extra?: Parameters<Context['reply']>[1]) => Promise<unknown>
}

export type TextContext = ChatContext & { message: { text: string } }

/**
 * Telegram front end of the ledger. Turns chat events into ledger calls and renders the results.
 */
export class ExpenseBot {
  private bot: Telegraf
  private cleanupTimer?: NodeJS.Timeout
  private conversationManager: ConversationManager
  private ledger: LedgerService
  private uiFormatter: UIFormatter

  constructor(
    config: BotConfig,
    ledger: LedgerService,
    conversationManager: ConversationManager,
  ) {
    this.ledger = ledger
    this.conversationManager = conversationManager
    this.bot = new Telegraf(config.telegramToken)
    this.uiFormatter = new UIFormatter()

    this.setupHandlers()
  }

  // Setup message handlers
  private setupHandlers(): void {
    this.bot.command(Command.START, this.handleStartCommand.bind(this))
    this.bot.command(Command.CANCEL, this.handleCancelCommand.bind(this))
    this.bot.command(Command.SUMMARY, this.handleSummaryCommand.bind(this))
    this.bot.command(Command.WEEK, this.handleWeekCommand.bind(this))
    this.bot.command(Command.MONTH, this.handleMonthCommand.bind(this))
    this.bot.command(Command.MONTH_CATEGORY, this.handleMonthCategoryCommand.bind(this))
    this.bot.command(Command.UNDO, this.handleUndoCommand.bind(this))

    this.bot.on(message('text'), this.handleTextMessage.bind(this))
    this.bot.on('callback_query', this.handleCallbackQuery.bind(this))

    this.bot.catch((error, ctx) => {
      logger.error(`Unhandled error while processing update ${ctx.update.update_id}:`, error)
    })
  }

  /**
   * Starts long polling. The returned promise settles when polling stops.
   */
  public start(): Promise<void> {
    this.cleanupTimer = setInterval(() => {
      this.conversationManager.cleanupOldConversations()
    }, CONVERSATION_CLEANUP_INTERVAL_MS)

    return this.bot.launch(() => {
      logger.info('Bot is polling for updates')
    })
  }

  /**
   * Stops polling. Returns false when Telegraf refuses because polling has not started yet.
   */
  public stop(reason?: string): boolean {
    clearInterval(this.cleanupTimer)
    try {
      this.bot.stop(reason)
    }
    catch (error) {
      logger.warn('Failed to stop bot:', error)

      return false
    }

    return true
  }

  private getUserId(ctx: ChatContext): string | undefined {
    return ctx.from?.id.toString()
  }

  /**
   * Runs a handler body and turns unexpected failures into a generic reply
   */
  private async withErrorReply(ctx: ChatContext, operation: string, task: () => Promise<void>): Promise<void> {
    try {
      await task()
    }
    catch (error) {
      logger.error(`Failed to ${operation}:`, error)
      try {
        await ctx.reply(GENERIC_FAILURE_MESSAGE)
      }
      catch (replyError) {
        logger.error('Failed to send error reply to user:', replyError)
      }
    }
  }

  // Command handlers
  private async handleStartCommand(ctx: ChatContext): Promise<void> {
    const userId = this.getUserId(ctx)
    if (userId) {
      this.conversationManager.resetConversation(userId)
    }
    await ctx.reply(WELCOME_MESSAGE)
  }

  private async handleCancelCommand(ctx: ChatContext): Promise<void> {
    const userId = this.getUserId(ctx)
    if (!userId) {
      return
    }

    const pending = this.conversationManager.takePendingExpense(userId)
    await ctx.reply(pending ? 'Pending expense discarded.' : 'Nothing to cancel.')
  }

  private async handleSummaryCommand(ctx: ChatContext): Promise<void> {
    const userId = this.getUserId(ctx)
    if (!userId) {
      return
    }

    await this.withErrorReply(ctx, 'build daily summary', async () => {
      const summary = await this.ledger.dailySummary(userId)
      await ctx.reply(this.uiFormatter.formatDailySummary(summary))
    })
  }

  private async handleWeekCommand(ctx: ChatContext): Promise<void> {
    const userId = this.getUserId(ctx)
    if (!userId) {
      return
    }

    await this.withErrorReply(ctx, 'build weekly summary', async () => {
      const summary = await this.ledger.weeklySummary(userId)
      await ctx.reply(this.uiFormatter.formatWeeklySummary(summary))
    })
  }

  private async handleMonthCommand(ctx: ChatContext): Promise<void> {
    const userId = this.getUserId(ctx)
    if (!userId) {
      return
    }

    await this.withErrorReply(ctx, 'build monthly daily summary', async () => {
      const summary = await this.ledger.monthlyDailySummary(userId)
      await ctx.reply(this.uiFormatter.formatMonthlyDailySummary(summary))
    })
  }

  private async handleMonthCategoryCommand(ctx: ChatContext): Promise<void> {
    const userId = this.getUserId(ctx)
    if (!userId) {
      return
    }

    await this.withErrorReply(ctx, 'build monthly category summary', async () => {
      const summary = await this.ledger.monthlyCategorySummary(userId)
      await ctx.reply(this.uiFormatter.formatMonthlyCategorySummary(summary))
    })
  }

  private async handleUndoCommand(ctx: ChatContext): Promise<void> {
    const userId = this.getUserId(ctx)
    if (!userId) {
      return
    }

    await this.withErrorReply(ctx, 'undo last expense', async () => {
      const result = await this.ledger.undoLast(userId)
      await ctx.reply(this.uiFormatter.formatUndo(result))
    })
  }

  // Text handler: "name amount" stages an expense and asks for its category
  public async handleTextMessage(ctx: TextContext): Promise<void> {
    const userId = this.getUserId(ctx)
    if (!userId) {
      return
    }

    const { text } = ctx.message
    if (text.startsWith('/')) {
      await ctx.reply('Unknown command. Send /start to see what I can do.')

      return
    }

    const parsed = parseExpenseMessage(text)
    if (!parsed.ok) {
      await ctx.reply(parsed.reason === 'format'
        ? '⚠️ Please enter in format: name amount'
        : '⚠️ Amount must be a number.')

      return
    }

    const conversation = this.conversationManager.getOrCreateConversation(userId)
    const prompt = this.uiFormatter.formatCategoryPrompt(parsed.label, parsed.amount)
    const replyText = conversation.status === ConversationStatus.AWAITING_CATEGORY
      ? `${this.uiFormatter.formatReplacedPending(conversation.pending.label, conversation.pending.amount)}\n\n${prompt}`
      : prompt

    this.conversationManager.setPendingExpense(userId, parsed.label, parsed.amount)
    await ctx.reply(replyText, this.uiFormatter.getCategoryKeyboard(this.ledger.categories))
  }

  public async handleCallbackQuery(ctx: ChatContext): Promise<void> {
    if (!ctx.callbackQuery || !('data' in ctx.callbackQuery)) {
      logger.warn('Received callback query without data')
      await this.answerCallbackQuery(ctx)

      return
    }

    const userId = this.getUserId(ctx)
    const { data } = ctx.callbackQuery

    if (userId && data.startsWith(CALLBACK_DATA_CATEGORY_PREFIX)) {
      const category = data.slice(CALLBACK_DATA_CATEGORY_PREFIX.length)
      await this.withErrorReply(ctx, 'record expense', async () => {
        await this.handleCategorySelected(ctx, userId, category)
      })
    }
    else {
      logger.warn(`Received unknown callback query data: ${data}`)
    }

    await this.answerCallbackQuery(ctx)
  }

  private async handleCategorySelected(ctx: ChatContext, userId: string, category: string): Promise<void> {
    const pending = this.conversationManager.takePendingExpense(userId)
    if (!pending) {
      await ctx.editMessageText('⚠️ No pending expense found.')

      return
    }

    let bucket: DayBucket
    try {
      bucket = await this.ledger.recordExpense(userId, pending.label, pending.amount, category)
    }
    catch (error) {
      if (error instanceof ExpenseValidationError && error.field !== 'category') {
        // A bad amount or label fails for every category, so the expense is dropped
        await ctx.editMessageText(`⚠️ ${error.message}`)

        return
      }

      // Nothing was recorded; stage the expense again for the next tap
      this.conversationManager.setPendingExpense(userId, pending.label, pending.amount)
      if (error instanceof ExpenseValidationError) {
        await ctx.editMessageText(`⚠️ ${error.message}`, this.uiFormatter.getCategoryKeyboard(this.ledger.categories))

        return
      }
      throw error
    }

    const entry = bucket[bucket.length - 1]
    await ctx.editMessageText(this.uiFormatter.formatRecorded(entry, bucket))
  }

  private async answerCallbackQuery(ctx: ChatContext): Promise<void> {
    try {
      await ctx.answerCbQuery()
    }
    catch (error) {
      // Usually the query is already answered or has timed out
      logger.debug('Failed to answer callback query:', error)
    }
  }
}
