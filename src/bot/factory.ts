// bot/factory.ts

import type { BotConfig } from '../config/types'
import type { LedgerStore } from '../services/ledger/interfaces'

import { MemoryConversationManager } from '../services/conversation/manager'
import { ExpenseLedger } from '../services/ledger/expense-ledger'
import { JsonFileLedgerStore } from '../services/ledger/json-file-store'
import { ExpenseBot } from './expense-bot'

export class ExpenseBotFactory {
  /**
   * Loads the ledger from disk and wires it into a bot. Rejects when the ledger file is corrupt.
   */
  static async createBot(config: BotConfig): Promise<ExpenseBot> {
    const ledger = await ExpenseLedger.open(this.createStore(config))
    const conversationManager = new MemoryConversationManager()

    return new ExpenseBot(config, ledger, conversationManager)
  }

  private static createStore(config: BotConfig): LedgerStore {
    return new JsonFileLedgerStore(config.ledgerFile)
  }
}
