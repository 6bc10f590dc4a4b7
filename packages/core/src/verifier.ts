import type { AnnotationRule, MemberGroup } from './groups'
import type { MemberDescriptor } from './member'
import type { GroupOrder } from './order'
import { classify } from './classifier'
import { ANNOTATION_RULES } from './groups'

/**
 * Ordering verdict for one checked member
 */
export interface MemberOrderVerdict<T extends MemberDescriptor = MemberDescriptor> {
  /** The member this verdict belongs to */
  member: T
  group: MemberGroup
  /** The member's group ranks before a group that already appeared */
  isWrong: boolean
  /** Same group as the previous member but not strictly after it by name */
  isAlphabeticallyWrong: boolean
  /**
   * Group to cite in "X should be before Y". Inherited through a run of
   * same-group members from the last group change. Absent for the first member.
   */
  previousGroup?: MemberGroup
  name: string
  /** Name of the immediately preceding checked member */
  previousName?: string
}

/**
 * Compute the verdict for one member given the verdict of the member before it.
 */
export function nextVerdict<T extends MemberDescriptor>(
  previous: MemberOrderVerdict<T> | undefined,
  member: T,
  group: MemberGroup,
  order: GroupOrder,
  alphabetize: boolean,
): MemberOrderVerdict<T> {
  const name = member.name

  if (!previous) {
    return { member, group, isWrong: false, isAlphabeticallyWrong: false, name }
  }

  const sameGroup = previous.group === group

  return {
    member,
    group,
    isWrong: (sameGroup && previous.isWrong) || order.rank(previous.group) > order.rank(group),
    isAlphabeticallyWrong: alphabetize && sameGroup && !(name > previous.name),
    previousGroup: sameGroup ? previous.previousGroup : previous.group,
    name,
    previousName: previous.name,
  }
}

/**
 * Verify the members of one class body, in source order.
 *
 * Members whose group is not in the order produce no verdict and are invisible
 * to their neighbours. State never crosses calls, so every class starts clean.
 * Alphabetical verdicts are only computed when `alphabetize` is set.
 */
export function verifyMembers<T extends MemberDescriptor>(
  members: readonly T[],
  order: GroupOrder,
  alphabetize = false,
  rules: readonly AnnotationRule[] = ANNOTATION_RULES,
): MemberOrderVerdict<T>[] {
  return members.reduce<MemberOrderVerdict<T>[]>((verdicts, member) => {
    const group = classify(member, order, rules)
    if (group === null)
      return verdicts

    verdicts.push(nextVerdict(verdicts.at(-1), member, group, order, alphabetize))
    return verdicts
  }, [])
}
