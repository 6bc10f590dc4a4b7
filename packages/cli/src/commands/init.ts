import type { Command } from 'commander'
import path from 'node:path'
import { writeDefaultConfig } from '@member-order/linter'
import { createLogger } from '@member-order/utils/logger'

const log = createLogger('init')

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Write a default .member-order.json')
    .argument('[path]', 'Project path', '.')
    .action(async (projectPath: string) => {
      try {
        await writeDefaultConfig(path.resolve(projectPath))
      }
      catch (error) {
        const msg = error instanceof Error ? error.message : String(error)
        log.error(`Init failed: ${msg}`)
        process.exitCode = 1
      }
    })
}
