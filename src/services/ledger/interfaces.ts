// services/ledger/interfaces.ts
import type {
  Category,
  DailySummary,
  DayBucket,
  IsoDate,
  LedgerData,
  MonthlyCategorySummary,
  MonthlyDailySummary,
  UndoResult,
  UserId,
  WeeklySummary,
} from '../../domain/types'

/**
 * Durable storage for the whole ledger
 */
export interface LedgerStore {
  /**
   * Reads the persisted ledger, or an empty one when nothing has been saved yet
   */
  load: () => Promise<LedgerData>

  /**
   * Overwrites the persisted ledger with the given state
   */
  save: (data: LedgerData) => Promise<void>
}

/**
 * Source of the current calendar date
 */
export interface Clock {
  today: () => IsoDate
}

export interface LedgerService {
  readonly categories: readonly Category[]

  /**
   * Appends an expense to today's bucket and persists the ledger.
   * Returns today's bucket including the new entry.
   */
  recordExpense: (userId: UserId, label: string, amount: number, category: string) => Promise<DayBucket>

  /**
   * Removes the most recently recorded expense of today
   */
  undoLast: (userId: UserId) => Promise<UndoResult>

  dailySummary: (userId: UserId, date?: IsoDate) => Promise<DailySummary>
  weeklySummary: (userId: UserId) => Promise<WeeklySummary>
  monthlyDailySummary: (userId: UserId) => Promise<MonthlyDailySummary>
  monthlyCategorySummary: (userId: UserId) => Promise<MonthlyCategorySummary>
}
