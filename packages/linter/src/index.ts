export {
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
  loadConfig,
  MemberOrderingOptionsSchema,
  parseProjectConfig,
  parseRuleOptions,
  ProjectConfigSchema,
  writeDefaultConfig,
} from './config'
export type { MemberOrderingOptions, ProjectConfig } from './config'

export { isFailingSeverity, Severity } from './issue'
export type { Issue } from './issue'

export { lintFiles, lintSource } from './lint'
export type { FileReport, LintResult } from './lint'

export { formatIssue, formatJson, formatReport } from './reporter'

export { isPrivateMember, MemberOrderingRule, toMemberDescriptor } from './rule'
export type { LocatedMember } from './rule'
