import { promises as fs } from 'node:fs'
import path from 'node:path'

import { InvalidInputError } from '../errors.js'
import type { MediaToolkit } from '../media/types.js'
import type { Stage } from '../progress/aggregator.js'
import {
  DEFAULT_CONTINUATION_SECONDS,
  framesForDuration,
  generateContinuation,
  type JobTiming,
} from '../remote/generate.js'
import type { RemoteJobClient } from '../remote/runpod.js'
import { runPipeline } from './run.js'
import type { PipelineControl, PipelineResult } from './types.js'

export const MIN_CONTINUATION_SECONDS = 1
export const MAX_CONTINUATION_SECONDS = 6

export const CONTINUATION_STAGES: readonly Stage[] = [
  { name: 'analyze', range: [0, 0.05] },
  { name: 'conditioning', range: [0.05, 0.1] },
  { name: 'generate', range: [0.1, 0.8] },
  { name: 'match', range: [0.8, 0.9] },
  { name: 'finalize', range: [0.9, 1] },
]

export type ContinuationOptions = {
  inputPath: string
  outputPath?: string | null
  /** Blank is allowed; the remote model then runs on the image alone. */
  prompt?: string | null
  negativePrompt?: string | null
  durationSeconds?: number
  steps?: number | null
  guidanceScale?: number | null
  /** Append the continuation to the original; when false the output is the continuation alone. */
  concatenate?: boolean
}

export type ContinuationDeps = {
  toolkit: MediaToolkit
  client: RemoteJobClient
  fetchImpl: typeof fetch
  timing?: JobTiming | null
}

/** `<stem>_extended.mp4` when appending, `<stem>_continued.mp4` for the continuation alone. */
export function defaultContinuationOutput(inputPath: string, concatenate = true): string {
  const parsed = path.parse(inputPath)
  return path.join(parsed.dir, `${parsed.name}_${concatenate ? 'extended' : 'continued'}.mp4`)
}

function resolveDuration(options: ContinuationOptions): number {
  const duration = options.durationSeconds ?? DEFAULT_CONTINUATION_SECONDS
  if (
    !Number.isFinite(duration) ||
    duration < MIN_CONTINUATION_SECONDS ||
    duration > MAX_CONTINUATION_SECONDS
  ) {
    throw new InvalidInputError(
      `Duration must be between ${MIN_CONTINUATION_SECONDS} and ${MAX_CONTINUATION_SECONDS} seconds (got ${duration}).`
    )
  }
  return duration
}

export async function runContinuationPipeline(
  options: ContinuationOptions,
  deps: ContinuationDeps,
  control: PipelineControl
): Promise<PipelineResult> {
  const concatenate = options.concatenate ?? true
  const outputPath = options.outputPath ?? defaultContinuationOutput(options.inputPath, concatenate)
  const { toolkit, client, fetchImpl, timing } = deps
  const { signal, logger } = control

  return runPipeline(
    {
      ...control,
      name: 'continue',
      stages: CONTINUATION_STAGES,
      inputPath: options.inputPath,
      outputPath,
    },
    async ({ progress, scratch }) => {
      const duration = resolveDuration(options)

      progress.report('analyze', 0, 'Analyzing video...')
      const input = await toolkit.probe(options.inputPath)
      progress.report('analyze', 1, `Input: ${input.width}x${input.height} @ ${input.fps.toFixed(2)} fps`)

      progress.report('conditioning', 0, 'Extracting last frame...')
      const lastFrame = scratch.file('last_frame.png')
      await toolkit.extractLastFrame({ input: options.inputPath, output: lastFrame })
      progress.report('conditioning', 1, 'Last frame ready')

      const generated = scratch.file('generated.mp4')
      await generateContinuation({
        client,
        request: {
          imagePath: lastFrame,
          prompt: options.prompt?.trim() ?? '',
          negativePrompt: options.negativePrompt,
          numFrames: framesForDuration(duration),
          steps: options.steps,
          guidanceScale: options.guidanceScale,
        },
        outputPath: generated,
        fetchImpl,
        timing,
        signal,
        logger,
        onProgress: (label, fraction) => progress.report('generate', fraction, label),
      })

      progress.report('match', 0, 'Matching frame rate and resolution...')
      const matched = scratch.file('continuation_matched.mp4')
      await toolkit.reencode({
        input: generated,
        output: matched,
        fps: input.fps,
        width: input.width,
        height: input.height,
      })
      progress.report('match', 1, 'Continuation matched')

      await fs.mkdir(path.dirname(path.resolve(outputPath)), { recursive: true })
      if (concatenate) {
        progress.report('finalize', 0, 'Preparing original...')
        const original = scratch.file('original_matched.mp4')
        await toolkit.reencode({ input: options.inputPath, output: original, fps: input.fps })
        progress.report('finalize', 0.5, 'Concatenating...')
        await toolkit.concat({
          first: original,
          second: matched,
          output: outputPath,
          listFile: scratch.file('concat.txt'),
        })
      } else {
        progress.report('finalize', 0, 'Writing continuation...')
        await fs.copyFile(matched, outputPath)
      }

      const output = await toolkit.probe(outputPath)
      return { outputPath, input, output }
    }
  )
}
