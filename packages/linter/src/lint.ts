import type { ParseResult } from '@member-order/utils/ast'
import type { ProjectConfig } from './config'
import type { Issue } from './issue'
import { ASTParser } from '@member-order/utils/ast'
import { discoverFiles } from '@member-order/utils/files'
import { createLogger } from '@member-order/utils/logger'
import { isFailingSeverity } from './issue'
import { MemberOrderingRule } from './rule'

const log = createLogger('lint')

/**
 * Outcome for one file
 */
export interface FileReport {
  filePath: string
  issues: Issue[]
  /** Parse errors; extraction may still have produced issues */
  errors: string[]
}

export interface LintResult {
  files: FileReport[]
  issueCount: number
  /** Files with at least one parse error */
  parseErrorCount: number
  /** Any issue with a failing severity (error or warning) */
  failed: boolean
}

function summarize(files: FileReport[]): LintResult {
  const issues = files.flatMap(file => file.issues)
  return {
    files,
    issueCount: issues.length,
    parseErrorCount: files.filter(file => file.errors.length > 0).length,
    failed: issues.some(issue => isFailingSeverity(issue.severity)),
  }
}

function reportFor(filePath: string, parseResult: ParseResult, rule: MemberOrderingRule): FileReport {
  for (const error of parseResult.errors) {
    log.warn(`${filePath}: ${error}`)
  }
  return {
    filePath,
    issues: rule.check(parseResult, filePath),
    errors: parseResult.errors,
  }
}

/**
 * Lint source text as if it were the given file
 */
export async function lintSource(
  source: string,
  filePath: string,
  rule: MemberOrderingRule,
  parser: ASTParser = new ASTParser(),
): Promise<FileReport> {
  const parseResult = await parser.parse(source, parser.detectLanguage(filePath))
  return reportFor(filePath, parseResult, rule)
}

/**
 * Lint every matching file under a path.
 *
 * The rule is built before any file is read, so a bad configuration fails
 * the whole run.
 *
 * @throws ConfigurationError for invalid rule options
 * @throws {Error} when the path does not exist or tree-sitter is unavailable
 */
export async function lintFiles(targetPath: string, config: ProjectConfig = {}): Promise<LintResult> {
  const rule = new MemberOrderingRule(config.rules?.['member-ordering'])

  const parser = new ASTParser()
  if (!parser.isAvailable()) {
    throw new Error('tree-sitter native module is not available; cannot parse sources')
  }

  const files = await discoverFiles(targetPath, {
    include: config.include,
    exclude: config.exclude,
    maxDepth: config.maxDepth,
  })
  log.debug(`Checking ${files.length} files under ${targetPath}`)

  const reports: FileReport[] = []
  for (const filePath of files) {
    const parseResult = await parser.parseFile(filePath)
    const report = reportFor(filePath, parseResult, rule)
    if (report.issues.length > 0) {
      log.debug(`${filePath}: ${report.issues.length} issues`)
    }
    reports.push(report)
  }

  return summarize(reports)
}
