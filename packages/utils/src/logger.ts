import type { ConsolaInstance } from 'consola'
import { createConsola, LogLevels } from 'consola'

// Diagnostics go to stderr; stdout is reserved for the lint report
export const logger: ConsolaInstance = createConsola({
  level: LogLevels.info,
  stdout: process.stderr,
  stderr: process.stderr,
})

// withTag() copies the level at creation time, so tagged loggers are tracked
// to keep setLogLevel() global
const tagged: ConsolaInstance[] = []

// Scoped logger with [tag] prefix
export function createLogger(tag: string): ConsolaInstance {
  const child = logger.withTag(tag)
  tagged.push(child)
  return child
}

// Set global log level (root + every logger from createLogger)
export function setLogLevel(level: number): void {
  logger.level = level
  for (const child of tagged) {
    child.level = level
  }
}

export { LogLevels } from 'consola'
