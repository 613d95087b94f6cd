const AMOUNT_REGEX = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/

export type ParsedExpenseMessage =
  | { amount: number, label: string, ok: true }
  | { ok: false, reason: 'amount' | 'format' }

/**
 * Parses a "name amount" message such as "coffee 5" or "train ticket 12.50".
 * The last word is the amount, everything before it is the name.
 */
export function parseExpenseMessage(text: string): ParsedExpenseMessage {
  const words = text.trim().split(/\s+/).filter(Boolean)

  if (words.length < 2) {
    return { ok: false, reason: 'format' }
  }

  const amountText = words[words.length - 1]
  if (!AMOUNT_REGEX.test(amountText)) {
    return { ok: false, reason: 'amount' }
  }

  return {
    amount: Number(amountText),
    label: words.slice(0, -1).join(' '),
    ok: true,
  }
}
