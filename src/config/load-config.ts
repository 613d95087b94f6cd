import path from 'node:path'
import process from 'node:process'
import { z } from 'zod'

import type { BotConfig } from './types'

import { DEFAULT_LEDGER_FILE } from '../constants'

const optionalString = z.string()
  .trim()
  .optional()
  .transform((value) => {
    return value || undefined
  })

const envSchema = z.object({
  DEBUG: optionalString,
  LEDGER_FILE: optionalString,
  TELEGRAM_BOT_TOKEN: optionalString,
  TELEGRAM_TOKEN: optionalString,
})

/**
 * Builds the bot configuration from environment variables.
 * The token is left empty when neither TELEGRAM_TOKEN nor TELEGRAM_BOT_TOKEN is set.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): BotConfig {
  const parsed = envSchema.parse(env)

  return {
    debug: parsed.DEBUG === 'true',
    ledgerFile: path.resolve(cwd, parsed.LEDGER_FILE ?? DEFAULT_LEDGER_FILE),
    telegramToken: parsed.TELEGRAM_TOKEN ?? parsed.TELEGRAM_BOT_TOKEN ?? '',
  }
}
