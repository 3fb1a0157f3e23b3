import type { ConsolaInstance } from 'consola'
import { createConsola, LogLevels } from 'consola'

// stdout carries the member listing, so every level is routed to stderr
export const logger: ConsolaInstance = createConsola({
  level: LogLevels.info,
  stdout: process.stderr,
  stderr: process.stderr,
})

// withTag() copies the level at creation time; keep children so setLogLevel reaches them
const children: ConsolaInstance[] = []

// Scoped logger with [tag] prefix
export function createLogger(tag: string): ConsolaInstance {
  const child = logger.withTag(tag)
  children.push(child)
  return child
}

export const LOG_LEVEL_NAMES = ['silent', 'error', 'warn', 'info', 'debug', 'trace'] as const

export type LogLevelName = (typeof LOG_LEVEL_NAMES)[number]

// Set global log level (affects the root and every createLogger child)
export function setLogLevel(level: number | LogLevelName): void {
  const value = typeof level === 'number' ? level : LogLevels[level]
  logger.level = value
  for (const child of children) {
    child.level = value
  }
}

export { LogLevels } from 'consola'
