import path from 'node:path'

import { InvalidInputError, ProcessFailureError } from '../errors.js'
import type { FrameInterpolator } from '../interpolation/rife.js'
import { countPasses, runInterpolationPasses } from '../interpolation/scheduler.js'
import type { MediaToolkit } from '../media/types.js'
import type { Stage } from '../progress/aggregator.js'
import { runPipeline } from './run.js'
import type { PipelineControl, PipelineResult } from './types.js'

export const DEFAULT_MULTIPLIER = 4
export const DEFAULT_QUALITY = 18

export const SLOW_MOTION_STAGES: readonly Stage[] = [
  { name: 'analyze', range: [0, 0.05] },
  { name: 'extract', range: [0.05, 0.3] },
  { name: 'interpolate', range: [0.3, 0.9] },
  { name: 'encode', range: [0.9, 1] },
]

export type SlowMotionOptions = {
  inputPath: string
  outputPath?: string | null
  multiplier?: number
  /** Output frame rate; the input's rate when unset. */
  fps?: number | null
  quality?: number
}

export type SlowMotionDeps = {
  toolkit: MediaToolkit
  interpolator: FrameInterpolator
}

export function defaultSlowMotionOutput(inputPath: string, multiplier: number): string {
  const parsed = path.parse(inputPath)
  return path.join(parsed.dir, `${parsed.name}_slomo${multiplier}x.mp4`)
}

export async function runSlowMotionPipeline(
  options: SlowMotionOptions,
  deps: SlowMotionDeps,
  control: PipelineControl
): Promise<PipelineResult> {
  const multiplier = options.multiplier ?? DEFAULT_MULTIPLIER
  const quality = options.quality ?? DEFAULT_QUALITY
  const outputPath = options.outputPath ?? defaultSlowMotionOutput(options.inputPath, multiplier)
  const { toolkit, interpolator } = deps
  const logger = control.logger

  return runPipeline(
    {
      ...control,
      name: 'slowmo',
      stages: SLOW_MOTION_STAGES,
      inputPath: options.inputPath,
      outputPath,
    },
    async ({ progress, scratch }) => {
      const passes = countPasses(multiplier)
      if (options.fps !== undefined && options.fps !== null && !(options.fps > 0)) {
        throw new InvalidInputError(`Output fps must be positive (got ${options.fps}).`)
      }

      progress.report('analyze', 0, 'Analyzing video...')
      const input = await toolkit.probe(options.inputPath)
      progress.report(
        'analyze',
        1,
        `Input: ${input.width}x${input.height} @ ${input.fps.toFixed(2)} fps, ${input.frameCount} frames`
      )

      const framesIn = await scratch.allocate('frames-in')
      progress.report('extract', 0, 'Extracting frames...')
      const extracted = await toolkit.extractFrames({
        input: options.inputPath,
        outputDir: framesIn,
        totalFrames: input.frameCount,
        onFrame: (current, total) =>
          progress.report('extract', current / total, `Extracting frames (${current}/${total})...`),
      })
      if (extracted === 0) {
        throw new ProcessFailureError('ffmpeg', null, 'no frames were extracted')
      }
      progress.report('extract', 1, `Extracted ${extracted} frames`)

      const framesOut = await scratch.allocate('frames-out')
      progress.report('interpolate', 0, `Interpolating (${2 ** passes}x)...`)
      const ok = await runInterpolationPasses({
        inputDir: framesIn,
        outputDir: framesOut,
        multiplier,
        interpolator,
        scratch,
        logger,
        onPassProgress: (passIndex, current, total) =>
          progress.report(
            'interpolate',
            (passIndex + current / total) / passes,
            `Interpolating pass ${passIndex + 1}/${passes} (${current}/${total})...`
          ),
      })
      if (!ok) {
        throw new ProcessFailureError('rife-ncnn-vulkan', null, 'frame interpolation failed')
      }
      progress.report('interpolate', 1, 'Interpolation done')

      const fps = options.fps ?? input.fps
      progress.report('encode', 0, 'Encoding video...')
      await toolkit.reassembleFrames({
        framesDir: framesOut,
        output: outputPath,
        fps,
        quality,
        onFrame: (current, total) =>
          progress.report('encode', current / total, `Encoding (${current}/${total})...`),
      })
      const output = await toolkit.probe(outputPath)
      return { outputPath, input, output }
    }
  )
}
