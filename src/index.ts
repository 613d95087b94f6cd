import 'dotenv/config'
import process from 'node:process'

import { ExpenseBotFactory } from './bot/factory'
import { loadConfig } from './config/load-config'
import { LedgerCorruptedError } from './domain/errors'
import { logger } from './utils/logger'

/**
 * Main function to start the bot
 */
async function startBot() {
  logger.info('Starting expense ledger bot')

  const config = loadConfig()

  logger.debug('Configuration loaded', {
    debug: config.debug,
    ledgerFile: config.ledgerFile,
  })

  if (!config.telegramToken) {
    logger.fatal('Error: Telegram bot token is not provided (set TELEGRAM_TOKEN)')
    process.exit(1)
  }

  const bot = await ExpenseBotFactory.createBot(config)
    .catch((error: unknown) => {
      if (error instanceof LedgerCorruptedError) {
        logger.fatal('Refusing to start with an unreadable ledger:', error.message)
      }
      else {
        logger.fatal('Error creating the bot:', error)
      }

      return process.exit(1)
    })

  const handleExit = (signal: string) => {
    logger.info(`Received ${signal}, stopping bot`)
    if (!bot.stop(signal)) {
      // Polling had not started, so launch would keep going without an exit here
      logger.info('Bot was not polling yet, exiting')
      process.exit(0)
    }
  }

  process.once('SIGINT', handleExit)
  process.once('SIGTERM', handleExit)

  await bot.start()
  logger.info('Bot stopped')
}

// Start the bot
startBot()
  .catch((error) => {
    logger.fatal('Unhandled error in the bot:', error)
    process.exit(1)
  })
