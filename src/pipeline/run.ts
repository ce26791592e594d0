import path from 'node:path'

import { describeFailure, failureKindOf, InvalidInputError, UserCancelledError } from '../errors.js'
import { type MediaInfo, SUPPORTED_VIDEO_EXTENSIONS } from '../media/types.js'
import { createStageProgress, type Stage, type StageProgress } from '../progress/aggregator.js'
import { type ScratchSpace, withScratchSpace } from '../temp/scratch.js'
import type { PipelineControl, PipelineResult } from './types.js'

export type PipelineContext = {
  progress: StageProgress
  scratch: ScratchSpace
}

export type PipelineOutput = {
  outputPath: string
  input: MediaInfo
  output: MediaInfo
}

export function isSupportedVideo(filePath: string): boolean {
  const ext = path.extname(filePath).toLowerCase()
  return SUPPORTED_VIDEO_EXTENSIONS.some((supported) => supported === ext)
}

export function assertUsablePaths(inputPath: string, outputPath: string): void {
  if (!isSupportedVideo(inputPath)) {
    const ext = path.extname(inputPath) || '(none)'
    throw new InvalidInputError(
      `Unsupported format ${ext}; expected one of ${SUPPORTED_VIDEO_EXTENSIONS.join(', ')}.`
    )
  }
  if (path.resolve(inputPath) === path.resolve(outputPath)) {
    throw new InvalidInputError('Output path must differ from the input path.')
  }
}

/**
 * Shared frame for every pipeline: validates the stage table, owns the scratch space for
 * the duration of `body`, emits the final 1.0 and turns any failure into a tagged
 * result. Once the signal has fired, any failure is reported as a cancellation, since
 * an interrupt from the terminal also reaches the tool being run. Never throws.
 */
export async function runPipeline(
  {
    name,
    stages,
    inputPath,
    outputPath,
    tempRoot,
    signal,
    onProgress,
    logger,
    now = Date.now,
  }: PipelineControl & {
    name: string
    stages: readonly Stage[]
    inputPath: string
    outputPath: string
  },
  body: (context: PipelineContext) => Promise<PipelineOutput>
): Promise<PipelineResult> {
  const startedAt = now()
  const elapsedSeconds = () => (now() - startedAt) / 1000

  try {
    const progress = createStageProgress({ stages, sink: onProgress, signal })
    assertUsablePaths(inputPath, outputPath)
    logger?.info(`${name} started`, { inputPath, outputPath })

    const result = await withScratchSpace({ root: tempRoot, inputPath, purpose: name }, (scratch) =>
      body({ progress, scratch })
    )
    progress.complete()

    logger?.info(`${name} finished`, { outputPath: result.outputPath, elapsedSeconds: elapsedSeconds() })
    return { success: true, ...result, elapsedSeconds: elapsedSeconds() }
  } catch (caught) {
    const error =
      signal?.aborted && failureKindOf(caught) !== 'cancelled' ? new UserCancelledError() : caught
    const errorKind = failureKindOf(error)
    if (errorKind === 'cancelled') {
      logger?.info(`${name} cancelled`, error === caught ? {} : { error: caught })
    } else {
      logger?.error(`${name} failed`, { kind: errorKind, error })
    }
    return {
      success: false,
      outputPath: null,
      errorMessage: describeFailure(error),
      errorKind,
      elapsedSeconds: elapsedSeconds(),
    }
  }
}
