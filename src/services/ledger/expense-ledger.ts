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
import type { Clock, LedgerService, LedgerStore } from './interfaces'

import { CATEGORIES } from '../../domain/categories'
import { toIsoDate } from '../../utils/date'
import { createLogger } from '../../utils/logger'
import { ReadWriteLock } from '../../utils/read-write-lock'
import { summarizeDay, summarizeMonthByCategory, summarizeMonthByDay, summarizeWeek } from './aggregations'
import { validateExpense } from './validation'

const logger = createLogger('ExpenseLedger')

/**
 * Clock reading the server's local calendar date
 */
export const systemClock: Clock = {
  today: () => {
    return toIsoDate(new Date())
  },
}

export interface ExpenseLedgerOptions {
  clock?: Clock
  initialData?: LedgerData
  store: LedgerStore
}

function copyBucket(bucket: DayBucket): DayBucket {
  return bucket.map((entry) => {
    return { ...entry }
  })
}

/**
 * In-memory expense ledger with write-through persistence.
 *
 * Every mutation holds the exclusive side of the lock until the store has written
 * the new state. If the write fails the mutation is undone before the error is
 * rethrown, so memory never runs ahead of disk. Summaries take the shared side.
 */
export class ExpenseLedger implements LedgerService {
  private clock: Clock
  private data: LedgerData
  private lock = new ReadWriteLock()
  private store: LedgerStore

  constructor(options: ExpenseLedgerOptions) {
    this.store = options.store
    this.clock = options.clock ?? systemClock
    this.data = options.initialData ?? new Map()
  }

  /**
   * Loads the persisted ledger through the store and wraps it in an engine
   */
  static async open(store: LedgerStore, clock?: Clock): Promise<ExpenseLedger> {
    const data = await store.load()

    return new ExpenseLedger({ clock, initialData: data, store })
  }

  get categories(): readonly Category[] {
    return CATEGORIES
  }

  async recordExpense(userId: UserId, label: string, amount: number, category: string): Promise<DayBucket> {
    const entry = validateExpense(label, amount, category)

    return this.lock.withWrite(async () => {
      const today = this.clock.today()
      const createdUser = !this.data.has(userId)
      const userLedger = this.data.get(userId) ?? new Map<IsoDate, DayBucket>()
      const createdBucket = !userLedger.has(today)
      const bucket = userLedger.get(today) ?? []

      bucket.push(entry)
      userLedger.set(today, bucket)
      this.data.set(userId, userLedger)

      try {
        await this.store.save(this.data)
      }
      catch (error) {
        bucket.pop()
        if (createdBucket) {
          userLedger.delete(today)
        }
        if (createdUser) {
          this.data.delete(userId)
        }
        logger.warn(`Rolled back expense for user ${userId} after a failed save`)
        throw error
      }

      logger.debug(`Recorded expense for user ${userId}`, { category: entry.category, date: today })

      return copyBucket(bucket)
    })
  }

  async undoLast(userId: UserId): Promise<UndoResult> {
    return this.lock.withWrite(async (): Promise<UndoResult> => {
      const today = this.clock.today()
      const bucket = this.data.get(userId)?.get(today)
      const removed = bucket?.pop()

      if (!bucket || !removed) {
        return { status: 'nothing_to_undo' }
      }

      try {
        await this.store.save(this.data)
      }
      catch (error) {
        bucket.push(removed)
        logger.warn(`Restored undone expense for user ${userId} after a failed save`)
        throw error
      }

      logger.debug(`Removed last expense for user ${userId}`, { date: today, remaining: bucket.length })

      return { bucket: copyBucket(bucket), removed: { ...removed }, status: 'removed' }
    })
  }

  async dailySummary(userId: UserId, date?: IsoDate): Promise<DailySummary> {
    return this.lock.withRead(() => {
      return summarizeDay(this.data.get(userId), date ?? this.clock.today())
    })
  }

  async weeklySummary(userId: UserId): Promise<WeeklySummary> {
    return this.lock.withRead(() => {
      return summarizeWeek(this.data.get(userId), this.clock.today())
    })
  }

  async monthlyDailySummary(userId: UserId): Promise<MonthlyDailySummary> {
    return this.lock.withRead(() => {
      return summarizeMonthByDay(this.data.get(userId), this.clock.today())
    })
  }

  async monthlyCategorySummary(userId: UserId): Promise<MonthlyCategorySummary> {
    return this.lock.withRead(() => {
      return summarizeMonthByCategory(this.data.get(userId), this.clock.today())
    })
  }
}
