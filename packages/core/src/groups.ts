/**
 * Member groups a class member can be classified into.
 *
 * The key doubles as the display name used in diagnostics.
 */
export const MemberGroup = {
  // Generic
  PublicFields: 'public-fields',
  PrivateFields: 'private-fields',
  PublicGetters: 'public-getters',
  PrivateGetters: 'private-getters',
  PublicSetters: 'public-setters',
  PrivateSetters: 'private-setters',
  Constructors: 'constructors',
  PublicMethods: 'public-methods',
  PrivateMethods: 'private-methods',

  // Framework (annotation override only)
  Inputs: 'inputs',
  Outputs: 'outputs',
  HostBindings: 'host-bindings',
  HostListeners: 'host-listeners',
  ViewChildren: 'view-children',
  ContentChildren: 'content-children',
} as const

export type MemberGroup = (typeof MemberGroup)[keyof typeof MemberGroup]

/**
 * Built-in canonical order, used when no order is configured
 */
export const DEFAULT_GROUP_ORDER: readonly MemberGroup[] = [
  MemberGroup.PublicFields,
  MemberGroup.PrivateFields,
  MemberGroup.PublicGetters,
  MemberGroup.PrivateGetters,
  MemberGroup.PublicSetters,
  MemberGroup.PrivateSetters,
  MemberGroup.Constructors,
  MemberGroup.PublicMethods,
  MemberGroup.PrivateMethods,
  MemberGroup.Inputs,
  MemberGroup.Outputs,
  MemberGroup.HostBindings,
  MemberGroup.HostListeners,
  MemberGroup.ViewChildren,
  MemberGroup.ContentChildren,
]

const GROUPS_BY_KEY: ReadonlyMap<string, MemberGroup> = new Map(
  Object.values(MemberGroup).map(group => [group, group]),
)

/**
 * Look up a group by its key. Returns undefined for unknown keys.
 */
export function parseMemberGroup(key: string): MemberGroup | undefined {
  return GROUPS_BY_KEY.get(key)
}

/**
 * An annotation that forces a member into a group regardless of its kind
 */
export interface AnnotationRule {
  readonly name: string
  readonly group: MemberGroup
}

/**
 * Annotation rules in priority order
 */
export const ANNOTATION_RULES: readonly AnnotationRule[] = [
  { name: 'Input', group: MemberGroup.Inputs },
  { name: 'Output', group: MemberGroup.Outputs },
  { name: 'HostBinding', group: MemberGroup.HostBindings },
  { name: 'HostListener', group: MemberGroup.HostListeners },
  { name: 'ViewChild', group: MemberGroup.ViewChildren },
  { name: 'ViewChildren', group: MemberGroup.ViewChildren },
  { name: 'ContentChild', group: MemberGroup.ContentChildren },
  { name: 'ContentChildren', group: MemberGroup.ContentChildren },
]
