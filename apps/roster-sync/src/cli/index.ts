#!/usr/bin/env tsx
import '../env.js'
import { runCli } from './run.js'

runCli(process.argv.slice(2))
  .then(exitCode => {
    process.exitCode = exitCode
  })
  .catch((error: unknown) => {
    console.error(error)
    process.exitCode = 1
  })
