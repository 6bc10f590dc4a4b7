import type { MemberGroup } from './groups'
import { duplicateGroupError, unknownGroupError } from './errors'
import { DEFAULT_GROUP_ORDER, parseMemberGroup } from './groups'

/**
 * Configured canonical group order.
 *
 * A group's rank is its index here; groups that are not listed are excluded
 * from checking.
 */
export class GroupOrder {
  private readonly ranks: ReadonlyMap<MemberGroup, number>

  constructor(readonly groups: readonly MemberGroup[]) {
    this.ranks = new Map(groups.map((group, index) => [group, index]))
  }

  has(group: MemberGroup): boolean {
    return this.ranks.has(group)
  }

  /**
   * Index of the group in the order, or -1 when it is not listed
   */
  rank(group: MemberGroup): number {
    return this.ranks.get(group) ?? -1
  }

  get size(): number {
    return this.groups.length
  }
}

/**
 * Build the group order from configured keys.
 *
 * An empty or absent list yields the built-in default order.
 *
 * @throws ConfigurationError when a key is unknown or listed twice
 */
export function buildGroupOrder(keys?: readonly string[]): GroupOrder {
  if (!keys || keys.length === 0) {
    return new GroupOrder(DEFAULT_GROUP_ORDER)
  }

  const groups: MemberGroup[] = []
  const seen = new Set<MemberGroup>()

  for (const key of keys) {
    const group = parseMemberGroup(key)
    if (!group)
      throw unknownGroupError(key)
    if (seen.has(group))
      throw duplicateGroupError(key)

    seen.add(group)
    groups.push(group)
  }

  return new GroupOrder(groups)
}
