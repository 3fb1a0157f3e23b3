#!/usr/bin/env node
import { program } from 'commander'

import pkg from '../package.json'
import { registerGenerateCommand } from './commands/generate'
import { loadEnv } from './config'

loadEnv()

program
  .name('sfpack')
  .description('Generate a package.xml manifest from a Salesforce project directory')
  .version(pkg.version)

registerGenerateCommand(program)

await program.parseAsync()
