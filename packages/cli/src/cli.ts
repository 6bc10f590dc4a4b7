#!/usr/bin/env node
import { program } from 'commander'

import pkg from '../package.json'
import { registerCheckCommand } from './commands/check'
import { registerGroupsCommand } from './commands/groups'
import { registerInitCommand } from './commands/init'

program
  .name('member-order')
  .description('Check that class members follow a canonical order')
  .version(pkg.version)

registerCheckCommand(program)
registerInitCommand(program)
registerGroupsCommand(program)

await program.parseAsync(process.argv)
