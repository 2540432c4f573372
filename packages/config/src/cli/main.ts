#!/usr/bin/env tsx
import { CliUsageError, USAGE } from "./args"
import { run } from "./run"

run(process.argv.slice(2), { stdout: process.stdout, env: process.env })
  .then((code) => {
    process.exitCode = code
  })
  .catch((err: unknown) => {
    if (err instanceof CliUsageError) {
      process.stderr.write(`${err.message}\n\n${USAGE}`)
    } else {
      process.stderr.write(`${err instanceof Error ? (err.stack ?? err.message) : String(err)}\n`)
    }
    process.exitCode = 1
  })
