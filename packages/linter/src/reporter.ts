import type { Issue } from './issue'
import type { LintResult } from './lint'
import path from 'node:path'

function plural(count: number, word: string): string {
  return `${count} ${count === 1 ? word : `${word}s`}`
}

/**
 * One line per issue: `line:column  severity  message  ruleId`.
 * Columns are shown 1-indexed.
 */
export function formatIssue(issue: Issue): string {
  const position = `${issue.startLine}:${issue.startColumn + 1}`
  return `  ${position.padEnd(8)}${issue.severity.padEnd(9)}${issue.message}  ${issue.ruleId}`
}

/**
 * Human readable report grouped by file, paths relative to cwd
 */
export function formatReport(result: LintResult, cwd: string = process.cwd()): string {
  const lines: string[] = []
  const withIssues = result.files.filter(file => file.issues.length > 0)

  for (const file of withIssues) {
    lines.push(path.relative(cwd, file.filePath) || file.filePath)
    for (const issue of file.issues) {
      lines.push(formatIssue(issue))
    }
    lines.push('')
  }

  lines.push(
    result.issueCount === 0
      ? 'No problems found'
      : `${plural(result.issueCount, 'problem')} in ${plural(withIssues.length, 'file')}`,
  )

  return lines.join('\n')
}

/**
 * Machine readable report: a flat JSON array of issues
 */
export function formatJson(result: LintResult): string {
  return JSON.stringify(result.files.flatMap(file => file.issues), null, 2)
}
