import { mkdir, readFile, rename, writeFile } from 'node:fs/promises'
import path from 'node:path'

import type { LedgerData } from '../../domain/types'
import type { LedgerStore } from './interfaces'

import { LedgerCorruptedError, LedgerPersistenceError } from '../../domain/errors'
import { createLogger } from '../../utils/logger'
import { decodeLedger, encodeLedger, ledgerFileSchema } from './codec'

const logger = createLogger('JsonFileLedgerStore')

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/**
 * Keeps the whole ledger in a single JSON document.
 * Every save rewrites the document through a temporary file and a rename.
 */
export class JsonFileLedgerStore implements LedgerStore {
  private filePath: string

  constructor(filePath: string) {
    this.filePath = filePath
    logger.debug(`JsonFileLedgerStore initialized for ${filePath}`)
  }

  async load(): Promise<LedgerData> {
    let raw: string
    try {
      raw = await readFile(this.filePath, 'utf8')
    }
    catch (error) {
      if (isMissingFileError(error)) {
        logger.info(`No ledger file at ${this.filePath}, starting with an empty ledger`)

        return new Map()
      }
      throw new LedgerCorruptedError(`Failed to read ledger file ${this.filePath}: ${errorMessage(error)}`, { cause: error })
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(raw)
    }
    catch (error) {
      throw new LedgerCorruptedError(`Ledger file ${this.filePath} is not valid JSON: ${errorMessage(error)}`, { cause: error })
    }

    const result = ledgerFileSchema.safeParse(parsed)
    if (!result.success) {
      const [issue] = result.error.issues
      const location = issue.path.join('.') || '(root)'
      throw new LedgerCorruptedError(`Ledger file ${this.filePath} has an unexpected structure at ${location}: ${issue.message}`)
    }

    const data = decodeLedger(result.data)
    logger.info(`Loaded ledger with ${data.size} users from ${this.filePath}`)

    return data
  }

  async save(data: LedgerData): Promise<void> {
    const tempPath = `${this.filePath}.tmp`

    try {
      await mkdir(path.dirname(this.filePath), { recursive: true })
      await writeFile(tempPath, JSON.stringify(encodeLedger(data)), 'utf8')
      await rename(tempPath, this.filePath)
      logger.debug(`Ledger written to ${this.filePath}`)
    }
    catch (error) {
      logger.error(`Failed to write ledger file ${this.filePath}:`, error)
      throw new LedgerPersistenceError(`Failed to write ledger file ${this.filePath}: ${errorMessage(error)}`, { cause: error })
    }
  }
}
