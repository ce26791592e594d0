import { promises as fs } from 'node:fs'

import type { AppLogger } from '../logging/logger.js'
import { FRAME_PATTERN } from '../media/ffmpeg.js'
import { createCounterProgressHandler, parseSlashCounter } from '../progress/parse.js'
import { runProcess } from '../process/run-process.js'

export const DEFAULT_RIFE_MODEL = 'rife-v4.6'

export type PassProgress = (current: number, total: number) => void

/** One doubling pass over a directory of numbered frames. */
export type FrameInterpolator = {
  runPass: (args: {
    inputDir: string
    outputDir: string
    onProgress?: PassProgress | null
  }) => Promise<boolean>
}

export type RifeOptions = {
  rifePath: string
  modelsDir: string
  model?: string
  gpu?: number
  uhd?: boolean
  logger?: AppLogger | null
}

export function buildRifeArgs({
  inputDir,
  outputDir,
  model = DEFAULT_RIFE_MODEL,
  gpu = 0,
  uhd = false,
}: {
  inputDir: string
  outputDir: string
  model?: string
  gpu?: number
  uhd?: boolean
}): string[] {
  const args = ['-i', inputDir, '-o', outputDir, '-m', model, '-g', String(gpu), '-f', FRAME_PATTERN]
  if (uhd) args.push('-x')
  return args
}

export function createRifeInterpolator(options: RifeOptions): FrameInterpolator {
  const { rifePath, modelsDir, logger } = options
  return {
    async runPass({ inputDir, outputDir, onProgress }) {
      await fs.mkdir(outputDir, { recursive: true })
      const args = buildRifeArgs({
        inputDir,
        outputDir,
        model: options.model,
        gpu: options.gpu,
        uhd: options.uhd,
      })
      logger?.debug('rife pass', { args })
      // Model names resolve relative to the working directory.
      const result = await runProcess({
        command: rifePath,
        args,
        cwd: modelsDir,
        label: 'rife-ncnn-vulkan',
        onLine: onProgress
          ? createCounterProgressHandler({
              parse: parseSlashCounter,
              onProgress: ({ current, total }) => onProgress(current, total),
            })
          : null,
      })
      if (result.code !== 0) {
        logger?.warn('rife pass failed', { code: result.code, output: result.outputTail })
      }
      return result.code === 0
    },
  }
}

export async function listInterpolationModels(modelsDir: string): Promise<string[]> {
  const entries = await fs.readdir(modelsDir, { withFileTypes: true }).catch(() => [])
  return entries
    .filter((entry) => entry.isDirectory() && entry.name.startsWith('rife'))
    .map((entry) => entry.name)
    .sort()
}
