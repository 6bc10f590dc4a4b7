import type { GroupOrder, MemberDescriptor, MemberOrderVerdict } from '@member-order/core'
import type { ClassMemberEntity, ParseResult, SourceSpan } from '@member-order/utils/ast'
import type { Issue } from './issue'
import { buildGroupOrder, verifyMembers } from '@member-order/core'
import { parseRuleOptions } from './config'
import { Severity } from './issue'

/**
 * Member descriptor carrying the member's location
 */
export interface LocatedMember extends MemberDescriptor, SourceSpan {}

/**
 * Private by naming convention: the `private` modifier, an ECMAScript private
 * name, or a leading underscore. `protected` counts as public.
 */
export function isPrivateMember(member: ClassMemberEntity): boolean {
  return member.accessibility === 'private'
    || member.hasPrivateName
    || member.name.startsWith('_')
}

export function toMemberDescriptor(member: ClassMemberEntity): LocatedMember {
  return {
    kind: member.kind,
    name: member.name,
    isPrivate: isPrivateMember(member),
    annotations: member.decorators,
    startLine: member.startLine,
    startColumn: member.startColumn,
    endLine: member.endLine,
    endColumn: member.endColumn,
  }
}

/**
 * Checks that class members follow the configured group order and,
 * optionally, alphabetical order within each group.
 */
export class MemberOrderingRule {
  static readonly ruleId = 'member-ordering'

  private static readonly warningMessage = 'should be before'
  private static readonly warningAlphabeticalMessage = 'should be alphabetically before'

  readonly id = MemberOrderingRule.ruleId
  readonly severity: Severity
  readonly order: GroupOrder
  readonly alphabetize: boolean

  /**
   * @throws ConfigurationError for malformed options or an unknown group key
   */
  constructor(options: unknown = {}) {
    const parsed = parseRuleOptions(options)
    this.order = buildGroupOrder(parsed.order)
    this.alphabetize = parsed.alphabetize ?? false
    this.severity = parsed.severity ?? Severity.Style
  }

  /**
   * Verify every class of a parsed file. Each class is verified on its own.
   */
  verify(parseResult: ParseResult): MemberOrderVerdict<LocatedMember>[] {
    return parseResult.classes.flatMap(classEntity =>
      verifyMembers(classEntity.members.map(toMemberDescriptor), this.order, this.alphabetize),
    )
  }

  /**
   * Issues for a parsed file: order issues first, then alphabetical ones.
   */
  check(parseResult: ParseResult, filePath: string): Issue[] {
    if (this.severity === Severity.None)
      return []

    const verdicts = this.verify(parseResult)

    const orderIssues = verdicts.flatMap(verdict =>
      verdict.isWrong && verdict.previousGroup
        ? [this.createIssue(
            filePath,
            verdict.member,
            `${verdict.group} ${MemberOrderingRule.warningMessage} ${verdict.previousGroup}`,
          )]
        : [],
    )

    const alphabeticalIssues = this.alphabetize
      ? verdicts.flatMap(verdict =>
          verdict.isAlphabeticallyWrong && verdict.previousName !== undefined
            ? [this.createIssue(
                filePath,
                verdict.member,
                `${verdict.name} ${MemberOrderingRule.warningAlphabeticalMessage} ${verdict.previousName}`,
              )]
            : [],
        )
      : []

    return [...orderIssues, ...alphabeticalIssues]
  }

  private createIssue(filePath: string, member: LocatedMember, message: string): Issue {
    return {
      ruleId: this.id,
      severity: this.severity,
      filePath,
      message,
      startLine: member.startLine,
      startColumn: member.startColumn,
      endLine: member.endLine,
      endColumn: member.endColumn,
    }
  }
}
