import type { ClassMemberEntity, ParseResult } from '@member-order/utils/ast'
import { ConfigErrorCode, ConfigurationError, MemberGroup } from '@member-order/core'
import { isPrivateMember, MemberOrderingRule, toMemberDescriptor } from '@member-order/linter/rule'
import { describe, expect, it } from 'vitest'

let nextLine = 1

function member(overrides: Partial<ClassMemberEntity>): ClassMemberEntity {
  const line = nextLine++
  return {
    kind: 'field',
    name: 'value',
    hasPrivateName: false,
    decorators: [],
    startLine: line,
    startColumn: 2,
    endLine: line,
    endColumn: 10,
    ...overrides,
  }
}

function file(...classes: ClassMemberEntity[][]): ParseResult {
  return {
    language: 'typescript',
    classes: classes.map((members, index) => ({
      name: `C${index}`,
      startLine: 1,
      startColumn: 0,
      endLine: 100,
      endColumn: 1,
      members,
    })),
    errors: [],
  }
}

describe('isPrivateMember', () => {
  it('uses the private modifier, private names and leading underscores', () => {
    expect(isPrivateMember(member({ accessibility: 'private' }))).toBe(true)
    expect(isPrivateMember(member({ name: '#state', hasPrivateName: true }))).toBe(true)
    expect(isPrivateMember(member({ name: '_cache' }))).toBe(true)
  })

  it('treats protected and unmarked members as public', () => {
    expect(isPrivateMember(member({ accessibility: 'protected' }))).toBe(false)
    expect(isPrivateMember(member({ accessibility: 'public' }))).toBe(false)
    expect(isPrivateMember(member({ name: 'value' }))).toBe(false)
  })
})

describe('toMemberDescriptor', () => {
  it('maps decorators to annotations and keeps the location', () => {
    const descriptor = toMemberDescriptor(member({
      kind: 'method',
      name: 'onClick',
      decorators: ['HostListener'],
      startLine: 7,
      startColumn: 2,
      endLine: 8,
      endColumn: 17,
    }))

    expect(descriptor).toEqual({
      kind: 'method',
      name: 'onClick',
      isPrivate: false,
      annotations: ['HostListener'],
      startLine: 7,
      startColumn: 2,
      endLine: 8,
      endColumn: 17,
    })
  })
})

describe('MemberOrderingRule', () => {
  it('defaults to the built-in order, style severity and no alphabetizing', () => {
    const rule = new MemberOrderingRule()
    expect(rule.id).toBe('member-ordering')
    expect(rule.severity).toBe('style')
    expect(rule.alphabetize).toBe(false)
    expect(rule.order.rank(MemberGroup.PublicFields)).toBe(0)
  })

  it('rejects unknown groups when constructed', () => {
    expect(() => new MemberOrderingRule({ order: ['public-fields', 'getters'] })).toThrow(
      ConfigurationError,
    )
  })

  it('rejects malformed options', () => {
    try {
      new MemberOrderingRule({ alphabetize: 'yes' })
      expect.unreachable()
    }
    catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError)
      expect((error as ConfigurationError).code).toBe(ConfigErrorCode.INVALID_OPTIONS)
    }
  })

  it('formats order issues as "<group> should be before <previousGroup>"', () => {
    const rule = new MemberOrderingRule()
    const issues = rule.check(
      file([
        member({ kind: 'method', name: 'run', startLine: 2, endLine: 2 }),
        member({ kind: 'field', name: 'count', startLine: 3, endLine: 3 }),
      ]),
      'src/counter.ts',
    )

    expect(issues).toEqual([
      {
        ruleId: 'member-ordering',
        severity: 'style',
        filePath: 'src/counter.ts',
        message: 'public-fields should be before public-methods',
        startLine: 3,
        startColumn: 2,
        endLine: 3,
        endColumn: 10,
      },
    ])
  })

  it('reports order issues before alphabetical issues', () => {
    const rule = new MemberOrderingRule({ alphabetize: true, severity: 'warning' })
    const issues = rule.check(
      file([
        member({ kind: 'field', name: 'b' }),
        member({ kind: 'field', name: 'a' }),
        member({ kind: 'method', name: 'run' }),
        member({ kind: 'constructor', name: '' }),
      ]),
      'src/a.ts',
    )

    expect(issues.map(issue => issue.message)).toEqual([
      'constructors should be before public-methods',
      'a should be alphabetically before b',
    ])
    expect(issues.every(issue => issue.severity === 'warning')).toBe(true)
  })

  it('ignores alphabetical order unless enabled', () => {
    const rule = new MemberOrderingRule()
    const issues = rule.check(
      file([member({ name: 'b' }), member({ name: 'a' })]),
      'src/a.ts',
    )
    expect(issues).toEqual([])
  })

  it('verifies each class independently', () => {
    const rule = new MemberOrderingRule()
    const issues = rule.check(
      file(
        [member({ kind: 'method', name: 'run' })],
        [member({ kind: 'field', name: 'count' })],
      ),
      'src/a.ts',
    )
    expect(issues).toEqual([])
  })

  it('routes decorated members into framework groups', () => {
    const rule = new MemberOrderingRule({ order: ['inputs', 'outputs', 'public-fields'] })
    const issues = rule.check(
      file([
        member({ name: 'closed', decorators: ['Output'] }),
        member({ name: 'title', decorators: ['Input'] }),
      ]),
      'src/card.ts',
    )
    expect(issues.map(issue => issue.message)).toEqual(['inputs should be before outputs'])
  })

  it('reports nothing at severity none', () => {
    const rule = new MemberOrderingRule({ severity: 'none' })
    const issues = rule.check(
      file([member({ kind: 'method', name: 'run' }), member({ kind: 'field', name: 'a' })]),
      'src/a.ts',
    )
    expect(issues).toEqual([])
  })
})
