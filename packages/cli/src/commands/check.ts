import type { MemberOrderingOptions, ProjectConfig } from '@member-order/linter'
import type { Command } from 'commander'
import { statSync } from 'node:fs'
import path from 'node:path'
import { isConfigurationError } from '@member-order/core'
import { formatJson, formatReport, lintFiles, loadConfig, parseRuleOptions } from '@member-order/linter'
import { createLogger, LogLevels, setLogLevel } from '@member-order/utils/logger'

const log = createLogger('check')

export interface CheckOptions {
  config?: string
  order?: string[]
  alphabetize?: boolean
  severity?: string
  json?: boolean
  verbose?: boolean
}

/**
 * Exit codes of the check command
 */
export const ExitCode = {
  Ok: 0,
  IssuesFound: 1,
  Unusable: 2,
} as const

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode]

/**
 * Command line flags override the rule options from the config file.
 *
 * @throws ConfigurationError when a flag value is invalid
 */
export function mergeRuleOptions(config: ProjectConfig, options: CheckOptions): MemberOrderingOptions {
  const fromFile: MemberOrderingOptions = config.rules?.['member-ordering'] ?? {}
  return parseRuleOptions({
    ...fromFile,
    ...(options.order ? { order: options.order } : {}),
    ...(options.alphabetize ? { alphabetize: true } : {}),
    ...(options.severity ? { severity: options.severity } : {}),
  })
}

function configRoot(targetPath: string): string {
  const resolved = path.resolve(targetPath)
  try {
    return statSync(resolved).isFile() ? path.dirname(resolved) : resolved
  }
  catch {
    return resolved
  }
}

/**
 * Run a check and print the report.
 *
 * @returns the process exit code
 */
export async function runCheck(targetPath: string, options: CheckOptions): Promise<ExitCode> {
  if (options.verbose) {
    setLogLevel(LogLevels.debug)
  }

  try {
    const config = await loadConfig(configRoot(targetPath), options.config)
    const result = await lintFiles(targetPath, {
      ...config,
      rules: { 'member-ordering': mergeRuleOptions(config, options) },
    })

    console.log(options.json ? formatJson(result) : formatReport(result))

    if (result.parseErrorCount > 0) {
      log.warn(`${result.parseErrorCount} files had parse errors`)
    }
    return result.failed ? ExitCode.IssuesFound : ExitCode.Ok
  }
  catch (error) {
    const msg = error instanceof Error ? error.message : String(error)
    log.error(isConfigurationError(error) ? `Configuration error: ${msg}` : `Check failed: ${msg}`)
    return ExitCode.Unusable
  }
}

export function registerCheckCommand(program: Command): void {
  program
    .command('check')
    .description('Check the order of class members')
    .argument('[path]', 'File or directory to check', '.')
    .option('-c, --config <file>', 'Config file (default: .member-order.json in the checked directory)')
    .option('--order <groups...>', 'Group order, overrides the config file')
    .option('--alphabetize', 'Require alphabetical order within each group')
    .option('--severity <level>', 'Issue severity (error, warning, style, none)')
    .option('--json', 'Print issues as JSON')
    .option('--verbose', 'Show detailed progress')
    .action(async (targetPath: string, options: CheckOptions) => {
      process.exitCode = await runCheck(targetPath, options)
    })
}
