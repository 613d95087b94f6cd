import type { ConversationManager, ConversationState, PendingExpense } from './interfaces'

import { PENDING_EXPENSE_TTL_MS } from '../../constants'
import { ConversationStatus } from '../../constants/types'
import { createLogger } from '../../utils/logger'

const logger = createLogger('ConversationManager')

export interface MemoryConversationManagerOptions {
  now?: () => Date
  pendingTtlMs?: number
}

export class MemoryConversationManager implements ConversationManager {
  private conversations = new Map<string, ConversationState>()
  private now: () => Date
  private pendingTtlMs: number

  constructor(options: MemoryConversationManagerOptions = {}) {
    this.now = options.now ?? (() => {
      return new Date()
    })
    this.pendingTtlMs = options.pendingTtlMs ?? PENDING_EXPENSE_TTL_MS
  }

  getOrCreateConversation(userId: string): ConversationState {
    const existing = this.conversations.get(userId)
    if (existing) {
      return existing
    }

    logger.debug(`Creating new conversation for user ${userId}`)
    const conversation: ConversationState = {
      lastUpdated: this.now(),
      status: ConversationStatus.IDLE,
      userId,
    }
    this.conversations.set(userId, conversation)

    return conversation
  }

  resetConversation(userId: string): void {
    logger.debug(`Resetting conversation for user ${userId}`)

    this.conversations.set(userId, {
      lastUpdated: this.now(),
      status: ConversationStatus.IDLE,
      userId,
    })
  }

  setPendingExpense(userId: string, label: string, amount: number): void {
    const previous = this.conversations.get(userId)
    if (previous?.status === ConversationStatus.AWAITING_CATEGORY) {
      logger.debug(`Replacing pending expense for user ${userId}`, { previous: previous.pending.label })
    }

    const now = this.now()
    this.conversations.set(userId, {
      lastUpdated: now,
      pending: { amount, label, stagedAt: now },
      status: ConversationStatus.AWAITING_CATEGORY,
      userId,
    })
  }

  takePendingExpense(userId: string): Pick<PendingExpense, 'amount' | 'label'> | undefined {
    const conversation = this.conversations.get(userId)
    if (conversation?.status !== ConversationStatus.AWAITING_CATEGORY) {
      return undefined
    }

    this.resetConversation(userId)

    const age = this.now().getTime() - conversation.pending.stagedAt.getTime()
    if (age > this.pendingTtlMs) {
      logger.debug(`Pending expense for user ${userId} expired`, { ageMs: age })

      return undefined
    }

    return { amount: conversation.pending.amount, label: conversation.pending.label }
  }

  cleanupOldConversations(maxAgeHours = 24): void {
    const now = this.now()
    let cleanedCount = 0

    for (const [userId, conversation] of this.conversations.entries()) {
      const ageHours = (now.getTime() - conversation.lastUpdated.getTime()) / (1000 * 60 * 60)
      if (ageHours > maxAgeHours) {
        this.conversations.delete(userId)
        cleanedCount++
      }
    }

    if (cleanedCount > 0) {
      logger.info(`Cleaned up ${cleanedCount} old conversations`, {
        maxAgeHours,
        remainingCount: this.conversations.size,
      })
    }
  }
}
