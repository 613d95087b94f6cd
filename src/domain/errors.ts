export type ExpenseField = 'amount' | 'category' | 'label'

/**
 * Base class for failures raised by the ledger
 */
export class LedgerError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'LedgerError'
  }
}

/**
 * Input to recordExpense was rejected. Nothing has been written.
 */
export class ExpenseValidationError extends LedgerError {
  readonly field: ExpenseField

  constructor(field: ExpenseField, message: string) {
    super(message)
    this.name = 'ExpenseValidationError'
    this.field = field
  }
}

/**
 * The ledger could not be written to disk. The in-memory change was rolled back.
 */
export class LedgerPersistenceError extends LedgerError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'LedgerPersistenceError'
  }
}

/**
 * The persisted ledger could not be read or does not have the expected shape
 */
export class LedgerCorruptedError extends LedgerError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'LedgerCorruptedError'
  }
}
