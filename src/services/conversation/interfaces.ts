import type { ConversationStatus } from '../../constants/types'

/**
 * Expense whose name and amount are known while the category is still being chosen
 */
export interface PendingExpense {
  amount: number
  label: string
  stagedAt: Date
}

interface ConversationBase {
  lastUpdated: Date
  userId: string
}

export interface IdleConversation extends ConversationBase {
  status: typeof ConversationStatus.IDLE
}

export interface AwaitingCategoryConversation extends ConversationBase {
  pending: PendingExpense
  status: typeof ConversationStatus.AWAITING_CATEGORY
}

export type ConversationState = AwaitingCategoryConversation | IdleConversation

export interface ConversationManager {
  cleanupOldConversations: (maxAgeHours?: number) => void
  getOrCreateConversation: (userId: string) => ConversationState
  resetConversation: (userId: string) => void

  /**
   * Stages an expense until its category arrives. Replaces any expense already pending.
   */
  setPendingExpense: (userId: string, label: string, amount: number) => void

  /**
   * Returns the pending expense and moves the conversation back to idle.
   * Returns undefined when nothing is pending or the pending expense has expired.
   */
  takePendingExpense: (userId: string) => Pick<PendingExpense, 'amount' | 'label'> | undefined
}
