import type { SourceSpan } from '@member-order/utils/ast'

/**
 * Issue severities, most to least severe
 */
export const Severity = {
  Error: 'error',
  Warning: 'warning',
  Style: 'style',
  None: 'none',
} as const

export type Severity = (typeof Severity)[keyof typeof Severity]

/**
 * A single diagnostic produced by a rule
 */
export interface Issue extends SourceSpan {
  ruleId: string
  severity: Severity
  filePath: string
  message: string
}

/**
 * Severities that make a run fail
 */
export function isFailingSeverity(severity: Severity): boolean {
  return severity === Severity.Error || severity === Severity.Warning
}
