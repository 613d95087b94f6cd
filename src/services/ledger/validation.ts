import { z } from 'zod'

import type { ExpenseField } from '../../domain/errors'
import type { Entry } from '../../domain/types'

import { CATEGORIES } from '../../domain/categories'
import { ExpenseValidationError } from '../../domain/errors'

const labelRequiredMessage = 'Expense name must not be empty'
const amountInvalidMessage = 'Amount must be a number'
const amountNegativeMessage = 'Amount must not be negative'
const categoryUnknownMessage = `Category must be one of: ${CATEGORIES.join(', ')}`

export const expenseInputSchema = z.object({
  amount: z.number({ invalid_type_error: amountInvalidMessage })
    .finite({ message: amountInvalidMessage })
    .nonnegative({ message: amountNegativeMessage }),
  category: z.enum(CATEGORIES, {
    errorMap: () => {
      return { message: categoryUnknownMessage }
    },
  }),
  label: z.string()
    .trim()
    .min(1, { message: labelRequiredMessage }),
})

function isExpenseField(value: unknown): value is ExpenseField {
  return value === 'amount' || value === 'category' || value === 'label'
}

/**
 * Checks raw expense input and builds an Entry from it.
 * The label is trimmed. Throws ExpenseValidationError on the first problem found.
 */
export function validateExpense(label: string, amount: number, category: string): Entry {
  const result = expenseInputSchema.safeParse({ amount, category, label })

  if (!result.success) {
    const [issue] = result.error.issues
    const [path] = issue.path
    const field = isExpenseField(path) ? path : 'label'
    throw new ExpenseValidationError(field, issue.message)
  }

  return {
    amount: result.data.amount,
    category: result.data.category,
    label: result.data.label,
  }
}
