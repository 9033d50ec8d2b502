#!/usr/bin/env node
import chalk from 'chalk'
import { buildProgram } from './cli.js'

buildProgram().parseAsync(process.argv).catch((err: unknown) => {
  console.error(chalk.red(err instanceof Error ? err.message : String(err)))
  process.exitCode = 1
})
