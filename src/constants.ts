import { CallbackData } from './constants/types'

// Callback query data values
export const CALLBACK_DATA_CATEGORY_PREFIX = CallbackData.CATEGORY_PREFIX

// Time intervals
export const CONVERSATION_CLEANUP_INTERVAL_MS = 1000 * 60 * 15 // 15 minutes
export const PENDING_EXPENSE_TTL_MS = 1000 * 60 * 30 // 30 minutes

// Storage defaults
export const DEFAULT_LEDGER_FILE = 'expenses.json'
