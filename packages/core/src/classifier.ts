import type { AnnotationRule } from './groups'
import type { MemberDescriptor } from './member'
import type { GroupOrder } from './order'
import { ANNOTATION_RULES, MemberGroup } from './groups'
import { MemberKind } from './member'

/**
 * Group forced by the member's annotations, if any.
 *
 * Rules are tried in priority order; the first one whose name the member
 * carries wins.
 */
export function matchAnnotation(
  annotations: readonly string[],
  rules: readonly AnnotationRule[] = ANNOTATION_RULES,
): MemberGroup | undefined {
  if (annotations.length === 0)
    return undefined

  return rules.find(rule => annotations.includes(rule.name))?.group
}

/**
 * Classify a member into exactly one group.
 */
export function classifyMember(
  member: MemberDescriptor,
  rules: readonly AnnotationRule[] = ANNOTATION_RULES,
): MemberGroup {
  const annotated = matchAnnotation(member.annotations, rules)
  if (annotated)
    return annotated

  switch (member.kind) {
    case MemberKind.Field:
      return member.isPrivate ? MemberGroup.PrivateFields : MemberGroup.PublicFields
    case MemberKind.Constructor:
      return MemberGroup.Constructors
    case MemberKind.Getter:
      return member.isPrivate ? MemberGroup.PrivateGetters : MemberGroup.PublicGetters
    case MemberKind.Setter:
      return member.isPrivate ? MemberGroup.PrivateSetters : MemberGroup.PublicSetters
    case MemberKind.Method:
      return member.isPrivate ? MemberGroup.PrivateMethods : MemberGroup.PublicMethods
  }
}

/**
 * Classify a member against the active order.
 *
 * Returns null when the member's group is not part of the order, meaning the
 * member is skipped entirely.
 */
export function classify(
  member: MemberDescriptor,
  order: GroupOrder,
  rules: readonly AnnotationRule[] = ANNOTATION_RULES,
): MemberGroup | null {
  const group = classifyMember(member, rules)
  return order.has(group) ? group : null
}
