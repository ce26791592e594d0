import type { FailureKind } from '../errors.js'
import type { AppLogger } from '../logging/logger.js'
import type { MediaInfo } from '../media/types.js'
import type { ProgressSink } from '../progress/aggregator.js'

export type PipelineSuccess = {
  success: true
  outputPath: string
  elapsedSeconds: number
  input: MediaInfo
  output: MediaInfo
}

export type PipelineFailure = {
  success: false
  outputPath: null
  /** Operator-facing, already prefixed with the failure category. */
  errorMessage: string
  errorKind: FailureKind
  elapsedSeconds: number
}

export type PipelineResult = PipelineSuccess | PipelineFailure

/** What every pipeline run takes besides its own options. */
export type PipelineControl = {
  /** Root under which the per-job scratch directory is created. */
  tempRoot: string
  signal?: AbortSignal | null
  onProgress?: ProgressSink | null
  logger?: AppLogger | null
  now?: () => number
}
