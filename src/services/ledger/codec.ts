import { z } from 'zod'

import type { LedgerData, UserLedger } from '../../domain/types'

import { CATEGORIES } from '../../domain/categories'
import { ISO_DATE_REGEX } from '../../utils/date'

/**
 * On disk an entry is a positional [label, amount, category] tuple
 */
const entryTupleSchema = z.tuple([z.string(), z.number(), z.enum(CATEGORIES)])

export const ledgerFileSchema = z.record(
  z.string(),
  z.record(
    z.string().regex(ISO_DATE_REGEX, 'Dates must be in YYYY-MM-DD format'),
    z.array(entryTupleSchema),
  ),
)

export type LedgerFile = z.infer<typeof ledgerFileSchema>

type EntryTuple = z.infer<typeof entryTupleSchema>

export function decodeLedger(file: LedgerFile): LedgerData {
  const data: LedgerData = new Map()

  for (const [userId, days] of Object.entries(file)) {
    const userLedger: UserLedger = new Map()
    for (const [date, tuples] of Object.entries(days)) {
      userLedger.set(date, tuples.map(([label, amount, category]) => {
        return { amount, category, label }
      }))
    }
    data.set(userId, userLedger)
  }

  return data
}

export function encodeLedger(data: LedgerData): LedgerFile {
  const file: LedgerFile = {}

  for (const [userId, userLedger] of data) {
    const days: LedgerFile[string] = {}
    for (const [date, bucket] of userLedger) {
      days[date] = bucket.map((entry): EntryTuple => {
        return [entry.label, entry.amount, entry.category]
      })
    }
    file[userId] = days
  }

  return file
}
