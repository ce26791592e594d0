import { InvalidInputError } from '../errors.js'
import type { AppLogger } from '../logging/logger.js'
import type { ScratchSpace } from '../temp/scratch.js'
import type { FrameInterpolator } from './rife.js'

export type InterpolationPass = {
  index: number
  inputDir: string
  outputDir: string
  isFinal: boolean
}

export type PassProgressCallback = (passIndex: number, current: number, total: number) => void

/**
 * floor(log2(multiplier)). A multiplier that is not a power of two is rounded down
 * (6 → 2 passes → 4x); callers that want to reject it check `isPowerOfTwo` first.
 */
export function countPasses(multiplier: number): number {
  if (!Number.isFinite(multiplier) || multiplier < 2) {
    throw new InvalidInputError(`Multiplier must be at least 2 (got ${multiplier}).`)
  }
  let passes = 0
  while (2 ** (passes + 1) <= multiplier) passes += 1
  return passes
}

export function isPowerOfTwo(value: number): boolean {
  return Number.isInteger(value) && value >= 2 && (value & (value - 1)) === 0
}

export function passScratchName(index: number): string {
  return `pass-${index}`
}

/** Chains passes: each reads the previous output; only the last writes `outputDir`. */
export function planInterpolationPasses({
  inputDir,
  outputDir,
  multiplier,
  scratch,
}: {
  inputDir: string
  outputDir: string
  multiplier: number
  scratch: Pick<ScratchSpace, 'file'>
}): InterpolationPass[] {
  const total = countPasses(multiplier)
  const passes: InterpolationPass[] = []
  let currentInput = inputDir
  for (let index = 0; index < total; index += 1) {
    const isFinal = index === total - 1
    const passOutput = isFinal ? outputDir : scratch.file(passScratchName(index))
    passes.push({ index, inputDir: currentInput, outputDir: passOutput, isFinal })
    currentInput = passOutput
  }
  return passes
}

/**
 * Runs the planned passes one at a time. Intermediate directories are removed on every
 * exit path; `inputDir` and `outputDir` are never touched. Returns false as soon as a
 * pass fails. Errors thrown by a pass (cancellation included) propagate after cleanup.
 */
export async function runInterpolationPasses({
  inputDir,
  outputDir,
  multiplier,
  interpolator,
  scratch,
  onPassProgress,
  logger,
}: {
  inputDir: string
  outputDir: string
  multiplier: number
  interpolator: FrameInterpolator
  scratch: Pick<ScratchSpace, 'file' | 'allocate' | 'discard'>
  onPassProgress?: PassProgressCallback | null
  logger?: AppLogger | null
}): Promise<boolean> {
  if (!isPowerOfTwo(multiplier)) {
    logger?.warn('multiplier is not a power of two, rounding down', {
      multiplier,
      effective: 2 ** countPasses(multiplier),
    })
  }
  const passes = planInterpolationPasses({ inputDir, outputDir, multiplier, scratch })
  const intermediates: string[] = []

  try {
    for (const pass of passes) {
      if (!pass.isFinal) {
        intermediates.push(await scratch.allocate(passScratchName(pass.index)))
      }
      logger?.info(`pass ${pass.index + 1}/${passes.length}`, {
        inputDir: pass.inputDir,
        outputDir: pass.outputDir,
      })
      const ok = await interpolator.runPass({
        inputDir: pass.inputDir,
        outputDir: pass.outputDir,
        onProgress: onPassProgress
          ? (current, total) => onPassProgress(pass.index, current, total)
          : null,
      })
      if (!ok) return false
    }
    return true
  } finally {
    // Leftovers go with the scratch scope, so a failed discard is only logged.
    for (const dir of intermediates) {
      await scratch.discard(dir).catch((error: unknown) => {
        logger?.warn('could not remove intermediate frames', { dir, error })
      })
    }
  }
}
