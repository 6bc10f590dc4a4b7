import {
  buildGroupOrder,
  ConfigErrorCode,
  ConfigurationError,
  DEFAULT_GROUP_ORDER,
  MemberGroup,
} from '@member-order/core'
import { describe, expect, it } from 'vitest'

describe('buildGroupOrder', () => {
  it('uses the built-in order when no keys are given', () => {
    expect(buildGroupOrder().groups).toEqual(DEFAULT_GROUP_ORDER)
    expect(buildGroupOrder([]).groups).toEqual(DEFAULT_GROUP_ORDER)
  })

  it('lists the generic groups before the framework groups by default', () => {
    const order = buildGroupOrder()
    expect(order.size).toBe(15)
    expect(order.rank(MemberGroup.PublicFields)).toBe(0)
    expect(order.rank(MemberGroup.Constructors)).toBe(6)
    expect(order.rank(MemberGroup.PrivateMethods)).toBe(8)
    expect(order.rank(MemberGroup.Inputs)).toBe(9)
    expect(order.rank(MemberGroup.ContentChildren)).toBe(14)
  })

  it('ranks groups by their configured position', () => {
    const order = buildGroupOrder(['constructors', 'public-methods', 'public-fields'])
    expect(order.rank(MemberGroup.Constructors)).toBe(0)
    expect(order.rank(MemberGroup.PublicMethods)).toBe(1)
    expect(order.rank(MemberGroup.PublicFields)).toBe(2)
  })

  it('reports -1 and has() false for unlisted groups', () => {
    const order = buildGroupOrder(['constructors'])
    expect(order.has(MemberGroup.PublicFields)).toBe(false)
    expect(order.rank(MemberGroup.PublicFields)).toBe(-1)
  })

  it('rejects unknown group keys', () => {
    expect(() => buildGroupOrder(['public-fields', 'statics'])).toThrow(ConfigurationError)
    try {
      buildGroupOrder(['statics'])
    }
    catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError)
      expect((error as ConfigurationError).code).toBe(ConfigErrorCode.UNKNOWN_GROUP)
      expect((error as ConfigurationError).message).toBe('Unknown member group: statics')
    }
  })

  it('rejects duplicate group keys', () => {
    expect(() => buildGroupOrder(['inputs', 'outputs', 'inputs'])).toThrow(
      'Member group listed more than once: inputs',
    )
  })
})
