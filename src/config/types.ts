// config/types.ts
export interface BotConfig {
  telegramToken: string

  // Absolute path of the JSON ledger file
  ledgerFile: string

  debug: boolean
}
