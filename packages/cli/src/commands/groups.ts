import type { Command } from 'commander'
import { ANNOTATION_RULES, DEFAULT_GROUP_ORDER } from '@member-order/core'

/**
 * Built-in groups in default order, with the decorators that select the
 * framework groups
 */
export function describeGroups(): string[] {
  return DEFAULT_GROUP_ORDER.map((group, index) => {
    const decorators = ANNOTATION_RULES
      .filter(rule => rule.group === group)
      .map(rule => `@${rule.name}`)
    const suffix = decorators.length > 0 ? `  (${decorators.join(', ')})` : ''
    return `${String(index + 1).padStart(2)}. ${group}${suffix}`
  })
}

export function registerGroupsCommand(program: Command): void {
  program
    .command('groups')
    .description('List the built-in member groups in default order')
    .action(() => {
      for (const line of describeGroups()) {
        console.log(line)
      }
    })
}
