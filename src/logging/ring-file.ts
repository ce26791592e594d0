import fs from 'node:fs/promises'
import path from 'node:path'

export type RingFileOptions = {
  filePath: string
  maxBytes: number
  maxFiles: number
}

export type RingFileWriter = {
  write: (line: string) => void
  flush: () => Promise<void>
}

const normalizeCount = (value: number, fallback: number) =>
  Number.isFinite(value) && value > 0 ? Math.max(1, Math.trunc(value)) : fallback

async function fileSize(filePath: string): Promise<number> {
  const stat = await fs.stat(filePath).catch(() => null)
  return stat?.size ?? 0
}

// log -> log.1 -> log.2 ...; the oldest generation falls off the end.
async function rotate(filePath: string, maxFiles: number): Promise<void> {
  if (maxFiles <= 1) {
    await fs.truncate(filePath, 0).catch(() => undefined)
    return
  }
  await fs.rm(`${filePath}.${maxFiles - 1}`, { force: true })
  for (let generation = maxFiles - 2; generation >= 0; generation -= 1) {
    const src = generation === 0 ? filePath : `${filePath}.${generation}`
    await fs.rename(src, `${filePath}.${generation + 1}`).catch(() => undefined)
  }
}

/**
 * Appends lines to a size-capped log file. Writes are queued so callers never await
 * them; `flush()` waits for everything queued so far.
 */
export function createRingFileWriter(options: RingFileOptions): RingFileWriter {
  const { filePath } = options
  const maxBytes = normalizeCount(options.maxBytes, 1024)
  const maxFiles = normalizeCount(options.maxFiles, 1)
  let dirReady = false
  let chain: Promise<void> = Promise.resolve()

  const write = (line: string) => {
    const normalized = line.endsWith('\n') ? line : `${line}\n`
    const bytes = Buffer.byteLength(normalized, 'utf8')
    chain = chain
      .then(async () => {
        if (!dirReady) {
          await fs.mkdir(path.dirname(filePath), { recursive: true })
          dirReady = true
        }
        if ((await fileSize(filePath)) + bytes > maxBytes) {
          await rotate(filePath, maxFiles)
        }
        await fs.appendFile(filePath, normalized, 'utf8')
      })
      .catch((error: unknown) => {
        process.stderr.write(`framestretch: log write failed: ${String(error)}\n`)
      })
  }

  return { write, flush: async () => await chain }
}
