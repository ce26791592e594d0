import { spawn } from 'node:child_process'

import { MissingExternalToolError, ProcessFailureError } from '../errors.js'

const OUTPUT_TAIL_LIMIT = 8192

export type ProcessResult = {
  code: number | null
  signal: NodeJS.Signals | null
  outputTail: string
}

export type RunProcessArgs = {
  command: string
  args: string[]
  label: string
  cwd?: string
  timeoutMs?: number | null
  onLine?: ((line: string) => void) | null
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error
}

function toSpawnError(error: Error, command: string, label: string): Error {
  if (isErrnoException(error) && error.code === 'ENOENT') {
    return new MissingExternalToolError([label], `not found at ${command}`)
  }
  return error
}

/**
 * Splits a text stream into lines. ffmpeg rewrites its status line with a bare `\r`,
 * so both `\r` and `\n` end a line.
 */
export function createLineSplitter(onLine: (line: string) => void): {
  push: (chunk: string) => void
  flush: () => void
} {
  let buffer = ''
  return {
    push(chunk) {
      buffer += chunk
      const lines = buffer.split(/\r\n|\r|\n/)
      buffer = lines.pop() ?? ''
      for (const line of lines) {
        if (line.trim()) onLine(line)
      }
    },
    flush() {
      const rest = buffer.trim()
      buffer = ''
      if (rest) onLine(rest)
    },
  }
}

/**
 * Runs a tool to completion and reports its exit status without judging it.
 * Line parsing and exit-code checks stay independent: the line callback only sees text,
 * the caller only sees the code.
 */
export async function runProcess({
  command,
  args,
  label,
  cwd,
  timeoutMs,
  onLine,
}: RunProcessArgs): Promise<ProcessResult> {
  return new Promise<ProcessResult>((resolve, reject) => {
    const proc = spawn(command, args, { cwd, stdio: ['ignore', 'pipe', 'pipe'] })
    let outputTail = ''
    let callbackError: unknown = null
    let settled = false

    const handleLine = (line: string) => {
      outputTail = `${outputTail}${line}\n`.slice(-OUTPUT_TAIL_LIMIT)
      if (!onLine || callbackError) return
      try {
        onLine(line)
      } catch (error) {
        // The tool keeps running; the error surfaces once it exits.
        callbackError = error
      }
    }

    const stdout = createLineSplitter(handleLine)
    const stderr = createLineSplitter(handleLine)

    if (proc.stdout) {
      proc.stdout.setEncoding('utf8')
      proc.stdout.on('data', (chunk: string) => stdout.push(chunk))
    }
    if (proc.stderr) {
      proc.stderr.setEncoding('utf8')
      proc.stderr.on('data', (chunk: string) => stderr.push(chunk))
    }

    const timeout =
      typeof timeoutMs === 'number' && timeoutMs > 0
        ? setTimeout(() => {
            proc.kill('SIGKILL')
            settled = true
            reject(new ProcessFailureError(label, null, `timed out after ${timeoutMs}ms`))
          }, timeoutMs)
        : null

    proc.on('error', (error) => {
      if (timeout) clearTimeout(timeout)
      if (settled) return
      settled = true
      reject(toSpawnError(error, command, label))
    })

    proc.on('close', (code, signal) => {
      if (timeout) clearTimeout(timeout)
      if (settled) return
      settled = true
      stdout.flush()
      stderr.flush()
      if (callbackError) {
        reject(callbackError)
        return
      }
      resolve({ code, signal, outputTail: outputTail.trim() })
    })
  })
}

export function assertProcessSucceeded(result: ProcessResult, label: string): void {
  if (result.code === 0) return
  const tail = result.outputTail.split('\n').slice(-5).join('\n')
  throw new ProcessFailureError(label, result.code, tail)
}

export async function runProcessCapture({
  command,
  args,
  label,
  timeoutMs,
}: {
  command: string
  args: string[]
  label: string
  timeoutMs?: number | null
}): Promise<string> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] })
    let stdout = ''
    let stderr = ''
    let settled = false

    const timeout =
      typeof timeoutMs === 'number' && timeoutMs > 0
        ? setTimeout(() => {
            proc.kill('SIGKILL')
            settled = true
            reject(new ProcessFailureError(label, null, `timed out after ${timeoutMs}ms`))
          }, timeoutMs)
        : null

    if (proc.stdout) {
      proc.stdout.setEncoding('utf8')
      proc.stdout.on('data', (chunk: string) => {
        stdout += chunk
      })
    }
    if (proc.stderr) {
      proc.stderr.setEncoding('utf8')
      proc.stderr.on('data', (chunk: string) => {
        if (stderr.length < OUTPUT_TAIL_LIMIT) {
          stderr += chunk
        }
      })
    }

    proc.on('error', (error) => {
      if (timeout) clearTimeout(timeout)
      if (settled) return
      settled = true
      reject(toSpawnError(error, command, label))
    })

    proc.on('close', (code) => {
      if (timeout) clearTimeout(timeout)
      if (settled) return
      settled = true
      if (code === 0) {
        resolve(stdout)
        return
      }
      reject(new ProcessFailureError(label, code, stderr))
    })
  })
}
