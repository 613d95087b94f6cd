// domain/types.ts
import type { Category } from './categories'

export type { Category } from './categories'

/**
 * Opaque identifier of a user as given by the transport layer
 */
export type UserId = string

/**
 * Calendar date in YYYY-MM-DD form, no time component
 */
export type IsoDate = string

/**
 * Calendar month in YYYY-MM form
 */
export type IsoMonth = string

export interface Entry {
  amount: number
  category: Category
  label: string
}

/**
 * Entries of one user on one date, in the order they were recorded
 */
export type DayBucket = Entry[]

export type UserLedger = Map<IsoDate, DayBucket>

export type LedgerData = Map<UserId, UserLedger>

export type UndoResult =
  | { bucket: DayBucket, removed: Entry, status: 'removed' }
  | { status: 'nothing_to_undo' }

export type DailySummary =
  | { date: IsoDate, entries: Entry[], status: 'ok', total: number }
  | { date: IsoDate, status: 'empty' }

export interface DayTotal {
  date: IsoDate
  total: number
}

export interface WeeklySummary {
  /** Seven rows, today first */
  days: DayTotal[]
  total: number
}

export type MonthlyDailySummary =
  | { days: DayTotal[], month: IsoMonth, status: 'ok', total: number }
  | { month: IsoMonth, status: 'empty' }

export interface CategoryTotal {
  category: Category
  /** Share of the month total, rounded to one decimal place */
  percentage: number
  total: number
}

export type MonthlyCategorySummary =
  | { categories: CategoryTotal[], month: IsoMonth, status: 'ok', total: number }
  | { month: IsoMonth, status: 'empty' }
