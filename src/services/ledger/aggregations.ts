import { Decimal } from 'decimal.js'

import type {
  Category,
  CategoryTotal,
  DailySummary,
  DayTotal,
  Entry,
  IsoDate,
  MonthlyCategorySummary,
  MonthlyDailySummary,
  UserLedger,
  WeeklySummary,
} from '../../domain/types'

import { addDays, isInMonth, monthOf } from '../../utils/date'

export const DAYS_IN_WEEK = 7

const ZERO = new Decimal(0)

export function sumEntries(entries: readonly Entry[]): Decimal {
  return entries.reduce((total, entry) => {
    return total.plus(entry.amount)
  }, ZERO)
}

/**
 * Non-empty buckets of the month containing `today`, in ascending date order
 */
function bucketsOfMonth(userLedger: UserLedger | undefined, today: IsoDate): Array<[IsoDate, Entry[]]> {
  if (!userLedger) {
    return []
  }

  const month = monthOf(today)

  return [...userLedger.entries()]
    .filter(([date, bucket]) => {
      return isInMonth(date, month) && bucket.length > 0
    })
    .sort(([a], [b]) => {
      return a < b ? -1 : a > b ? 1 : 0
    })
}

export function summarizeDay(userLedger: UserLedger | undefined, date: IsoDate): DailySummary {
  const bucket = userLedger?.get(date) ?? []

  if (bucket.length === 0) {
    return { date, status: 'empty' }
  }

  return {
    date,
    entries: bucket.map((entry) => {
      return { ...entry }
    }),
    status: 'ok',
    total: sumEntries(bucket).toNumber(),
  }
}

/**
 * Totals for today and the six calendar days before it, today first.
 * Days without entries are reported with a zero total.
 */
export function summarizeWeek(userLedger: UserLedger | undefined, today: IsoDate): WeeklySummary {
  const days: DayTotal[] = []
  let total = ZERO

  for (let offset = 0; offset < DAYS_IN_WEEK; offset++) {
    const date = addDays(today, -offset)
    const dayTotal = sumEntries(userLedger?.get(date) ?? [])
    total = total.plus(dayTotal)
    days.push({ date, total: dayTotal.toNumber() })
  }

  return { days, total: total.toNumber() }
}

/**
 * Totals per day of the current month. Only days with entries get a row.
 */
export function summarizeMonthByDay(userLedger: UserLedger | undefined, today: IsoDate): MonthlyDailySummary {
  const month = monthOf(today)
  const buckets = bucketsOfMonth(userLedger, today)

  if (buckets.length === 0) {
    return { month, status: 'empty' }
  }

  let total = ZERO
  const days = buckets.map(([date, bucket]) => {
    const dayTotal = sumEntries(bucket)
    total = total.plus(dayTotal)

    return { date, total: dayTotal.toNumber() }
  })

  return { days, month, status: 'ok', total: total.toNumber() }
}

/**
 * Totals per category of the current month with their share of the month total.
 * Categories are listed in the order they first occur in the month.
 */
export function summarizeMonthByCategory(userLedger: UserLedger | undefined, today: IsoDate): MonthlyCategorySummary {
  const month = monthOf(today)
  const totals = new Map<Category, Decimal>()
  let total = ZERO

  for (const [, bucket] of bucketsOfMonth(userLedger, today)) {
    for (const entry of bucket) {
      totals.set(entry.category, (totals.get(entry.category) ?? ZERO).plus(entry.amount))
      total = total.plus(entry.amount)
    }
  }

  if (total.isZero()) {
    return { month, status: 'empty' }
  }

  const categories: CategoryTotal[] = [...totals.entries()].map(([category, categoryTotal]) => {
    return {
      category,
      percentage: categoryTotal.div(total).times(100).toDecimalPlaces(1, Decimal.ROUND_HALF_UP).toNumber(),
      total: categoryTotal.toNumber(),
    }
  })

  return { categories, month, status: 'ok', total: total.toNumber() }
}
