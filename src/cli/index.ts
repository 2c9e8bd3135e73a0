#!/usr/bin/env node
import { loadDotenv } from './config.ts'
import { run } from './program.ts'

loadDotenv()

run(process.argv)
  .then((exitCode) => {
    process.exitCode = exitCode
  })
  .catch((error: unknown) => {
    console.error(error)
    process.exitCode = 1
  })
