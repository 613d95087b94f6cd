import { createConsola } from 'consola'
import process from 'node:process'

const isDebug = process.env.LOG_LEVEL === 'debug' || process.env.DEBUG === 'true'

/**
 * Default logger instance with standard configuration
 */
export const logger = createConsola({
  level: isDebug ? 5 : 3,
})

/**
 * Creates a logger tagged with the name of a module or component
 */
export function createLogger(name: string) {
  return logger.withTag(name)
}
