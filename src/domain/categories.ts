/**
 * Expense categories in the order they are offered to the user.
 * The set is closed: entries with any other category are rejected.
 */
export const CATEGORIES = [
  'Food',
  'Drinks',
  'Entertainment',
  'Misc.',
  'Transport',
  'Travel',
  'Housing',
] as const

export type Category = typeof CATEGORIES[number]
