import type { IsoDate, LedgerData } from '../../src/domain/types'
import type { LedgerFile } from '../../src/services/ledger/codec'
import type { Clock, LedgerStore } from '../../src/services/ledger/interfaces'

import { LedgerPersistenceError } from '../../src/domain/errors'
import { encodeLedger } from '../../src/services/ledger/codec'

export class FakeClock implements Clock {
  current: IsoDate

  constructor(current: IsoDate) {
    this.current = current
  }

  today(): IsoDate {
    return this.current
  }
}

/**
 * Keeps a snapshot of every save so tests can see exactly what reached the store
 */
export class MemoryLedgerStore implements LedgerStore {
  failNextSave = false
  saveGate?: Promise<void>
  snapshots: LedgerFile[] = []
  private initial: LedgerData

  constructor(initial: LedgerData = new Map()) {
    this.initial = initial
  }

  async load(): Promise<LedgerData> {
    return this.initial
  }

  async save(data: LedgerData): Promise<void> {
    if (this.saveGate) {
      await this.saveGate
    }
    if (this.failNextSave) {
      this.failNextSave = false
      throw new LedgerPersistenceError('Failed to write ledger file: disk full')
    }
    this.snapshots.push(encodeLedger(data))
  }

  get lastSnapshot(): LedgerFile | undefined {
    return this.snapshots[this.snapshots.length - 1]
  }
}

export function createDeferred() {
  let resolve: () => void = () => {}
  const promise = new Promise<void>((done) => {
    resolve = done
  })

  return {
    promise,
    resolve: () => {
      resolve()
    },
  }
}

export function flushPromises(): Promise<void> {
  return new Promise((done) => {
    setTimeout(done, 0)
  })
}
