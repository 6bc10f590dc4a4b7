import type { Issue, LintResult } from '@member-order/linter'
import { formatIssue, formatJson, formatReport } from '@member-order/linter/reporter'
import { describe, expect, it } from 'vitest'

function issue(overrides: Partial<Issue>): Issue {
  return {
    ruleId: 'member-ordering',
    severity: 'style',
    filePath: '/repo/src/a.ts',
    message: 'public-fields should be before public-methods',
    startLine: 3,
    startColumn: 2,
    endLine: 3,
    endColumn: 12,
    ...overrides,
  }
}

function result(files: LintResult['files']): LintResult {
  const issueCount = files.reduce((sum, file) => sum + file.issues.length, 0)
  return { files, issueCount, parseErrorCount: 0, failed: false }
}

describe('formatIssue', () => {
  it('prints a 1-indexed column, severity, message and rule id', () => {
    expect(formatIssue(issue({}))).toBe(
      '  3:3     style    public-fields should be before public-methods  member-ordering',
    )
  })
})

describe('formatReport', () => {
  it('says so when there are no problems', () => {
    expect(formatReport(result([{ filePath: '/repo/src/a.ts', issues: [], errors: [] }]), '/repo')).toBe(
      'No problems found',
    )
  })

  it('groups issues by file with a summary', () => {
    const report = formatReport(
      result([
        { filePath: '/repo/src/a.ts', issues: [issue({}), issue({ startLine: 9, message: 'a should be alphabetically before b' })], errors: [] },
        { filePath: '/repo/src/b.ts', issues: [], errors: [] },
        { filePath: '/repo/src/c.ts', issues: [issue({ filePath: '/repo/src/c.ts', severity: 'error' })], errors: [] },
      ]),
      '/repo',
    )

    expect(report.split('\n')).toEqual([
      'src/a.ts',
      '  3:3     style    public-fields should be before public-methods  member-ordering',
      '  9:3     style    a should be alphabetically before b  member-ordering',
      '',
      'src/c.ts',
      '  3:3     error    public-fields should be before public-methods  member-ordering',
      '',
      '3 problems in 2 files',
    ])
  })

  it('uses singular words for one problem', () => {
    const report = formatReport(result([{ filePath: '/repo/a.ts', issues: [issue({})], errors: [] }]), '/repo')
    expect(report.split('\n').at(-1)).toBe('1 problem in 1 file')
  })
})

describe('formatJson', () => {
  it('flattens issues into one array', () => {
    const json = formatJson(result([
      { filePath: '/repo/a.ts', issues: [issue({ filePath: '/repo/a.ts' })], errors: [] },
      { filePath: '/repo/b.ts', issues: [issue({ filePath: '/repo/b.ts' })], errors: [] },
    ]))
    expect(JSON.parse(json).map((i: Issue) => i.filePath)).toEqual(['/repo/a.ts', '/repo/b.ts'])
  })
})
