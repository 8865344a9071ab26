#!/usr/bin/env node
import { main } from './cli/main.js'
import { closeLogger } from './helpers/loggers.js'

void main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    console.error(error)
    process.exitCode = 1
  })
  .finally(() => closeLogger())
