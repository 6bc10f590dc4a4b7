/**
 * Kinds of class members the classifier distinguishes
 */
export const MemberKind = {
  Field: 'field',
  Constructor: 'constructor',
  Getter: 'getter',
  Setter: 'setter',
  Method: 'method',
} as const

export type MemberKind = (typeof MemberKind)[keyof typeof MemberKind]

/**
 * One class member as it appears in source.
 *
 * Hosts extend this with their own data (source location, node handles);
 * the core passes the whole object through to the verdict.
 */
export interface MemberDescriptor {
  kind: MemberKind
  /** Sort key. Empty string for an unnamed constructor. */
  name: string
  /** Visibility, derived by the host from its naming convention */
  isPrivate: boolean
  /** Raw annotation (decorator) names in source order */
  annotations: readonly string[]
}
