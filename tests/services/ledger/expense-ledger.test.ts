import { beforeEach, describe, expect, it } from 'vitest'

import { CATEGORIES } from '../../../src/domain/categories'
import { ExpenseValidationError, LedgerPersistenceError } from '../../../src/domain/errors'
import { ExpenseLedger } from '../../../src/services/ledger/expense-ledger'
import { createDeferred, FakeClock, flushPromises, MemoryLedgerStore } from '../../helpers/ledger-fakes'

const USER = '1001'
const OTHER_USER = '2002'

describe('ExpenseLedger', () => {
  let clock: FakeClock
  let store: MemoryLedgerStore
  let ledger: ExpenseLedger

  beforeEach(() => {
    clock = new FakeClock('2026-10-19')
    store = new MemoryLedgerStore()
    ledger = new ExpenseLedger({ clock, store })
  })

  describe('recordExpense', () => {
    it('records expenses and reports them in the daily summary', async () => {
      await ledger.recordExpense(USER, 'coffee', 5, 'Food')
      const bucket = await ledger.recordExpense(USER, 'lunch', 12.5, 'Food')

      expect(bucket).toEqual([
        { amount: 5, category: 'Food', label: 'coffee' },
        { amount: 12.5, category: 'Food', label: 'lunch' },
      ])

      const summary = await ledger.dailySummary(USER)
      expect(summary).toEqual({
        date: '2026-10-19',
        entries: bucket,
        status: 'ok',
        total: 17.5,
      })
    })

    it('keeps the daily total equal to the sum of recorded amounts', async () => {
      const amounts = [1.1, 2.2, 3.3, 0.4]
      for (const amount of amounts) {
        await ledger.recordExpense(USER, 'item', amount, 'Misc.')
      }

      const summary = await ledger.dailySummary(USER)
      if (summary.status !== 'ok') {
        throw new Error('expected a non-empty summary')
      }

      expect(summary.entries).toHaveLength(amounts.length)
      expect(summary.total).toBe(7)
    })

    it('trims the label', async () => {
      const bucket = await ledger.recordExpense(USER, '  bus ticket  ', 2.4, 'Transport')

      expect(bucket[0].label).toBe('bus ticket')
    })

    it('accepts a zero amount', async () => {
      const bucket = await ledger.recordExpense(USER, 'free sample', 0, 'Food')

      expect(bucket).toEqual([{ amount: 0, category: 'Food', label: 'free sample' }])
    })

    it('returns a copy of the bucket', async () => {
      const bucket = await ledger.recordExpense(USER, 'coffee', 5, 'Food')
      bucket.push({ amount: 1, category: 'Food', label: 'sneaky' })
      bucket[0].amount = 100

      const summary = await ledger.dailySummary(USER)
      expect(summary).toMatchObject({ entries: [{ amount: 5, category: 'Food', label: 'coffee' }], total: 5 })
    })

    it.each([
      ['label', '   ', 5, 'Food'],
      ['amount', 'coffee', Number.NaN, 'Food'],
      ['amount', 'coffee', Number.POSITIVE_INFINITY, 'Food'],
      ['amount', 'refund', -3, 'Food'],
      ['category', 'coffee', 5, 'Groceries'],
    ] as const)('rejects an invalid %s without writing anything', async (field, label, amount, category) => {
      const attempt = ledger.recordExpense(USER, label, amount, category)

      await expect(attempt).rejects.toBeInstanceOf(ExpenseValidationError)
      await expect(attempt).rejects.toMatchObject({ field })
      expect(store.snapshots).toHaveLength(0)
      expect(await ledger.dailySummary(USER)).toEqual({ date: '2026-10-19', status: 'empty' })
    })

    it('persists the whole ledger after every mutation', async () => {
      await ledger.recordExpense(USER, 'coffee', 5, 'Food')
      await ledger.recordExpense(OTHER_USER, 'rent', 800, 'Housing')

      expect(store.snapshots).toHaveLength(2)
      expect(store.lastSnapshot).toEqual({
        [OTHER_USER]: { '2026-10-19': [['rent', 800, 'Housing']] },
        [USER]: { '2026-10-19': [['coffee', 5, 'Food']] },
      })
    })

    it('rolls back a new user when the save fails', async () => {
      store.failNextSave = true

      await expect(ledger.recordExpense(USER, 'coffee', 5, 'Food')).rejects.toBeInstanceOf(LedgerPersistenceError)
      expect(await ledger.dailySummary(USER)).toEqual({ date: '2026-10-19', status: 'empty' })

      await ledger.recordExpense(OTHER_USER, 'tea', 2, 'Drinks')
      expect(store.lastSnapshot).toEqual({
        [OTHER_USER]: { '2026-10-19': [['tea', 2, 'Drinks']] },
      })
    })

    it('rolls back an appended entry when the save fails', async () => {
      await ledger.recordExpense(USER, 'coffee', 5, 'Food')
      store.failNextSave = true

      await expect(ledger.recordExpense(USER, 'lunch', 12.5, 'Food')).rejects.toThrow('disk full')

      expect(await ledger.dailySummary(USER)).toMatchObject({
        entries: [{ amount: 5, category: 'Food', label: 'coffee' }],
        total: 5,
      })
    })

    it('files entries under the clock date', async () => {
      clock.current = '2026-10-18'
      await ledger.recordExpense(USER, 'cinema', 11, 'Entertainment')
      clock.current = '2026-10-19'

      expect(await ledger.dailySummary(USER)).toEqual({ date: '2026-10-19', status: 'empty' })
      expect(await ledger.dailySummary(USER, '2026-10-18')).toMatchObject({ status: 'ok', total: 11 })
    })
  })

  describe('undoLast', () => {
    it('removes the most recent entry of today', async () => {
      await ledger.recordExpense(USER, 'coffee', 5, 'Food')
      await ledger.recordExpense(USER, 'lunch', 12.5, 'Food')

      const result = await ledger.undoLast(USER)

      expect(result).toEqual({
        bucket: [{ amount: 5, category: 'Food', label: 'coffee' }],
        removed: { amount: 12.5, category: 'Food', label: 'lunch' },
        status: 'removed',
      })
      expect(await ledger.dailySummary(USER)).toMatchObject({ total: 5 })
      expect(store.lastSnapshot).toEqual({ [USER]: { '2026-10-19': [['coffee', 5, 'Food']] } })
    })

    it('signals nothing to undo once the day is emptied', async () => {
      await ledger.recordExpense(USER, 'coffee', 5, 'Food')

      expect(await ledger.undoLast(USER)).toMatchObject({ bucket: [], status: 'removed' })
      expect(await ledger.undoLast(USER)).toEqual({ status: 'nothing_to_undo' })
      expect(await ledger.dailySummary(USER)).toEqual({ date: '2026-10-19', status: 'empty' })
      expect(store.snapshots).toHaveLength(2)
    })

    it('signals nothing to undo for an unknown user', async () => {
      expect(await ledger.undoLast(USER)).toEqual({ status: 'nothing_to_undo' })
      expect(store.snapshots).toHaveLength(0)
    })

    it('never removes entries from earlier days', async () => {
      clock.current = '2026-10-18'
      await ledger.recordExpense(USER, 'cinema', 11, 'Entertainment')
      clock.current = '2026-10-19'

      expect(await ledger.undoLast(USER)).toEqual({ status: 'nothing_to_undo' })
      expect(await ledger.dailySummary(USER, '2026-10-18')).toMatchObject({ total: 11 })
    })

    it('restores the entry when the save fails', async () => {
      await ledger.recordExpense(USER, 'coffee', 5, 'Food')
      await ledger.recordExpense(USER, 'lunch', 12.5, 'Food')
      store.failNextSave = true

      await expect(ledger.undoLast(USER)).rejects.toBeInstanceOf(LedgerPersistenceError)

      expect(await ledger.dailySummary(USER)).toMatchObject({
        entries: [
          { amount: 5, category: 'Food', label: 'coffee' },
          { amount: 12.5, category: 'Food', label: 'lunch' },
        ],
        total: 17.5,
      })
    })
  })

  describe('summaries', () => {
    it('reports seven weekly rows whose totals add up', async () => {
      clock.current = '2026-10-14'
      await ledger.recordExpense(USER, 'groceries', 42.35, 'Food')
      clock.current = '2026-10-19'
      await ledger.recordExpense(USER, 'coffee', 3.2, 'Drinks')

      const summary = await ledger.weeklySummary(USER)

      expect(summary.days).toHaveLength(7)
      expect(summary.days[0]).toEqual({ date: '2026-10-19', total: 3.2 })
      expect(summary.days[5]).toEqual({ date: '2026-10-14', total: 42.35 })
      expect(summary.total).toBe(45.55)
    })

    it('reports monthly totals per day', async () => {
      clock.current = '2026-10-02'
      await ledger.recordExpense(USER, 'train', 8, 'Transport')
      clock.current = '2026-10-19'
      await ledger.recordExpense(USER, 'coffee', 5, 'Food')
      await ledger.recordExpense(USER, 'lunch', 12.5, 'Food')

      expect(await ledger.monthlyDailySummary(USER)).toEqual({
        days: [
          { date: '2026-10-02', total: 8 },
          { date: '2026-10-19', total: 17.5 },
        ],
        month: '2026-10',
        status: 'ok',
        total: 25.5,
      })
    })

    it('reports monthly totals per category', async () => {
      clock.current = '2026-10-05'
      await ledger.recordExpense(USER, 'groceries', 30, 'Food')
      clock.current = '2026-10-19'
      await ledger.recordExpense(USER, 'taxi', 10, 'Transport')

      expect(await ledger.monthlyCategorySummary(USER)).toEqual({
        categories: [
          { category: 'Food', percentage: 75, total: 30 },
          { category: 'Transport', percentage: 25, total: 10 },
        ],
        month: '2026-10',
        status: 'ok',
        total: 40,
      })
    })

    it('reports empty months', async () => {
      expect(await ledger.monthlyDailySummary(USER)).toEqual({ month: '2026-10', status: 'empty' })
      expect(await ledger.monthlyCategorySummary(USER)).toEqual({ month: '2026-10', status: 'empty' })
    })

    it('keeps users apart', async () => {
      await ledger.recordExpense(USER, 'coffee', 5, 'Food')
      await ledger.recordExpense(OTHER_USER, 'rent', 800, 'Housing')

      expect(await ledger.dailySummary(USER)).toMatchObject({ total: 5 })
      expect(await ledger.dailySummary(OTHER_USER)).toMatchObject({ total: 800 })
    })
  })

  describe('concurrency', () => {
    it('does not lose interleaved mutations', async () => {
      await Promise.all([
        ledger.recordExpense(USER, 'a', 1, 'Food'),
        ledger.recordExpense(OTHER_USER, 'b', 2, 'Food'),
        ledger.recordExpense(USER, 'c', 3, 'Food'),
        ledger.recordExpense(OTHER_USER, 'd', 4, 'Food'),
      ])

      expect(store.snapshots).toHaveLength(4)
      expect(store.lastSnapshot).toEqual({
        [OTHER_USER]: { '2026-10-19': [['b', 2, 'Food'], ['d', 4, 'Food']] },
        [USER]: { '2026-10-19': [['a', 1, 'Food'], ['c', 3, 'Food']] },
      })
    })

    it('holds readers back until the pending save completes', async () => {
      const gate = createDeferred()
      store.saveGate = gate.promise

      const recording = ledger.recordExpense(USER, 'coffee', 5, 'Food')
      let summaryTotal: number | undefined
      const reading = ledger.dailySummary(USER).then((summary) => {
        summaryTotal = summary.status === 'ok' ? summary.total : 0
      })

      await flushPromises()
      expect(summaryTotal).toBeUndefined()

      gate.resolve()
      await Promise.all([recording, reading])
      expect(summaryTotal).toBe(5)
    })
  })

  it('opens with the data loaded from the store', async () => {
    const seeded = new MemoryLedgerStore(new Map([
      [USER, new Map([['2026-10-19', [{ amount: 9.99, category: 'Entertainment' as const, label: 'album' }]]])],
    ]))

    const opened = await ExpenseLedger.open(seeded, clock)

    expect(await opened.dailySummary(USER)).toMatchObject({ total: 9.99 })
  })

  it('exposes the category list in menu order', () => {
    expect(ledger.categories).toEqual(['Food', 'Drinks', 'Entertainment', 'Misc.', 'Transport', 'Travel', 'Housing'])
    expect(ledger.categories).toBe(CATEGORIES)
  })
})
