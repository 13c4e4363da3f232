#!/usr/bin/env node
import { runCliMain } from './cli-main.js'

await runCliMain({
  argv: process.argv.slice(2),
  fetch: globalThis.fetch.bind(globalThis),
  stdout: process.stdout,
  stderr: process.stderr,
  cwd: process.cwd(),
  exit: (code) => process.exit(code),
  setExitCode: (code) => {
    process.exitCode = code
  },
})
