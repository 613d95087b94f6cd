import { Markup } from 'telegraf'

import type {
  Category,
  DailySummary,
  Entry,
  MonthlyCategorySummary,
  MonthlyDailySummary,
  UndoResult,
  WeeklySummary,
} from '../domain/types'

import { CALLBACK_DATA_CATEGORY_PREFIX } from '../constants'
import { sumEntries } from '../services/ledger/aggregations'

const NO_EXPENSES_TODAY = 'No expenses today.'
const NO_EXPENSES_THIS_MONTH = 'No expenses recorded this month.'

export const WELCOME_MESSAGE = `👋 Welcome to the expense tracker!

Send me an expense like:
coffee 5
lunch 12.50

Commands:
/summary - Today's expenses
/week - Weekly summary
/month - Monthly daily totals
/month_category - Monthly category summary
/undo - Remove last entry
/cancel - Discard the expense waiting for a category`

export class UIFormatter {
  public formatMoney(amount: number): string {
    return `$${amount.toFixed(2)}`
  }

  public getCategoryKeyboard(categories: readonly Category[]) {
    return Markup.inlineKeyboard(categories.map((category) => {
      return [Markup.button.callback(category, `${CALLBACK_DATA_CATEGORY_PREFIX}${category}`)]
    }))
  }

  public formatCategoryPrompt(label: string, amount: number): string {
    return `Select a category for "${label} - ${this.formatMoney(amount)}":`
  }

  public formatReplacedPending(label: string, amount: number): string {
    return `Replaced the pending expense "${label} - ${this.formatMoney(amount)}".`
  }

  public formatEntry(entry: Entry): string {
    return `${entry.label} - ${this.formatMoney(entry.amount)} (${entry.category})`
  }

  /**
   * Entry lines followed by the total of the given entries
   */
  public formatEntries(entries: readonly Entry[]): string {
    const lines = entries.map((entry) => {
      return `${entry.label}: ${this.formatMoney(entry.amount)} (${entry.category})`
    })

    return `${lines.join('\n')}\n\n💰 Total: ${this.formatMoney(sumEntries(entries).toNumber())}`
  }

  public formatRecorded(entry: Entry, bucket: readonly Entry[]): string {
    return `✅ Recorded: ${this.formatEntry(entry)}\n\n🧾 Today's summary:\n${this.formatEntries(bucket)}`
  }

  public formatUndo(result: UndoResult): string {
    if (result.status === 'nothing_to_undo') {
      return '⚠️ No expenses to undo today.'
    }

    const summary = result.bucket.length > 0 ? this.formatEntries(result.bucket) : NO_EXPENSES_TODAY

    return `✅ Removed last entry: ${this.formatEntry(result.removed)}\n\n🧾 Updated summary:\n${summary}`
  }

  public formatDailySummary(summary: DailySummary): string {
    if (summary.status === 'empty') {
      return NO_EXPENSES_TODAY
    }

    return `🧾 Today's summary:\n${this.formatEntries(summary.entries)}`
  }

  public formatWeeklySummary(summary: WeeklySummary): string {
    const lines = summary.days.map((day) => {
      return `${day.date}: ${this.formatMoney(day.total)}`
    })

    return `🧾 Weekly summary:\n${lines.join('\n')}\n\n💰 Total week: ${this.formatMoney(summary.total)}`
  }

  public formatMonthlyDailySummary(summary: MonthlyDailySummary): string {
    if (summary.status === 'empty') {
      return NO_EXPENSES_THIS_MONTH
    }

    const lines = summary.days.map((day) => {
      return `${day.date}: ${this.formatMoney(day.total)}`
    })

    return `🧾 Monthly daily summary:\n${lines.join('\n')}\n\n💰 Total month: ${this.formatMoney(summary.total)}`
  }

  public formatMonthlyCategorySummary(summary: MonthlyCategorySummary): string {
    if (summary.status === 'empty') {
      return NO_EXPENSES_THIS_MONTH
    }

    const lines = summary.categories.map((row) => {
      return `${row.category}: ${this.formatMoney(row.total)} (${row.percentage.toFixed(1)}%)`
    })

    return `🧾 Monthly category summary:\n${lines.join('\n')}\n\n💰 Total month: ${this.formatMoney(summary.total)}`
  }
}
