#!/usr/bin/env node
import { describeFailure } from './errors.js'
import { EXIT_CANCELLED, EXIT_FAILURE, runCli } from './run.js'

// First Ctrl-C asks the pipeline to stop at its next checkpoint; a second one exits.
function onInterrupt(handler: () => void): () => void {
  let interrupted = false
  const listener = () => {
    if (interrupted) process.exit(EXIT_CANCELLED)
    interrupted = true
    handler()
  }
  process.on('SIGINT', listener)
  return () => {
    process.off('SIGINT', listener)
  }
}

runCli(process.argv.slice(2), {
  env: process.env,
  fetch: globalThis.fetch.bind(globalThis),
  stdout: process.stdout,
  stderr: process.stderr,
  onInterrupt,
})
  .then((code) => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    process.stderr.write(`${describeFailure(error)}\n`)
    process.exitCode = EXIT_FAILURE
  })
