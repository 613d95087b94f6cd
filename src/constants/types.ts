/**
 * Conversation status values
 */
export const ConversationStatus = {
  AWAITING_CATEGORY: 'awaiting_category',
  IDLE: 'idle',
} as const

/**
 * Callback query data values
 */
export const CallbackData = {
  CATEGORY_PREFIX: 'category:',
} as const

/**
 * Bot command names
 */
export const Command = {
  CANCEL: 'cancel',
  MONTH: 'month',
  MONTH_CATEGORY: 'month_category',
  START: 'start',
  SUMMARY: 'summary',
  UNDO: 'undo',
  WEEK: 'week',
} as const
