import { randomUUID } from 'node:crypto'
import { promises as fs } from 'node:fs'
import { tmpdir } from 'node:os'
import path from 'node:path'

export type ScratchSpace = {
  /** Job id, derived from the input file's stem. */
  readonly id: string
  readonly dir: string
  /** Creates (or reuses) a named directory inside the job dir. */
  allocate: (name: string) => Promise<string>
  /** Path inside the job dir, nothing created. */
  file: (name: string) => string
  /** Removes one allocated directory ahead of release. Safe to call twice. */
  discard: (dir: string) => Promise<void>
  /** Removes the whole job dir. Second and later calls do nothing. */
  release: () => Promise<void>
  readonly released: boolean
}

export function resolveScratchRoot({
  env,
  configured,
}: {
  env: Record<string, string | undefined>
  configured?: string | null
}): string {
  const fromConfig = configured?.trim()
  if (fromConfig) return path.resolve(fromConfig)
  const fromEnv = env.FRAMESTRETCH_TEMP_DIR?.trim()
  if (fromEnv) return path.resolve(fromEnv)
  return path.join(tmpdir(), 'framestretch')
}

export function deriveJobId(inputPath: string): string {
  const stem = path.basename(inputPath, path.extname(inputPath))
  const safe = stem.replace(/[^A-Za-z0-9._-]+/g, '_').replace(/^[._]+/, '')
  return safe || 'job'
}

export async function createScratchSpace({
  root,
  inputPath,
  purpose,
}: {
  root: string
  inputPath: string
  purpose: string
}): Promise<ScratchSpace> {
  const id = deriveJobId(inputPath)
  await fs.mkdir(root, { recursive: true })
  // Two runs on the same file must not share a job dir.
  const dir = await fs.mkdtemp(path.join(root, `${id}_${purpose}-${randomUUID().slice(0, 8)}-`))
  let released = false

  const insideJob = (target: string) => {
    const relative = path.relative(dir, target)
    return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative)
  }

  return {
    id,
    dir,
    async allocate(name) {
      if (released) {
        throw new Error(`Scratch space for ${id} was already released.`)
      }
      const target = path.join(dir, name)
      if (!insideJob(target)) {
        throw new Error(`Scratch directory "${name}" escapes the job directory.`)
      }
      await fs.mkdir(target, { recursive: true })
      return target
    },
    file(name) {
      return path.join(dir, name)
    },
    async discard(target) {
      if (!insideJob(target)) {
        throw new Error(`Refusing to remove ${target}: not part of job ${id}.`)
      }
      await fs.rm(target, { recursive: true, force: true })
    },
    async release() {
      if (released) return
      released = true
      await fs.rm(dir, { recursive: true, force: true })
    },
    get released() {
      return released
    },
  }
}

/**
 * Scoped acquisition: the job dir exists for the duration of `fn` and is removed on
 * every exit path, including throws and cancellation.
 */
export async function withScratchSpace<T>(
  options: { root: string; inputPath: string; purpose: string },
  fn: (scratch: ScratchSpace) => Promise<T>
): Promise<T> {
  const scratch = await createScratchSpace(options)
  try {
    return await fn(scratch)
  } finally {
    await scratch.release()
  }
}
