import type { IsoDate, IsoMonth } from '../domain/types'

export const ISO_DATE_REGEX = /^\d{4}-\d{2}-\d{2}$/

const MS_PER_DAY = 1000 * 60 * 60 * 24

function pad(value: number, length = 2): string {
  return String(value).padStart(length, '0')
}

/**
 * Formats the local calendar date of a Date as YYYY-MM-DD
 */
export function toIsoDate(date: Date): IsoDate {
  return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
}

/**
 * Shifts a calendar date by a number of days. Works in UTC so DST changes never skip or repeat a day.
 */
export function addDays(date: IsoDate, days: number): IsoDate {
  const [year, month, day] = date.split('-').map(Number)
  const shifted = new Date(Date.UTC(year, month - 1, day) + days * MS_PER_DAY)

  return `${pad(shifted.getUTCFullYear(), 4)}-${pad(shifted.getUTCMonth() + 1)}-${pad(shifted.getUTCDate())}`
}

export function monthOf(date: IsoDate): IsoMonth {
  return date.slice(0, 7)
}

export function isInMonth(date: IsoDate, month: IsoMonth): boolean {
  return monthOf(date) === month
}
