export {
  type FramestretchConfig,
  loadFramestretchConfig,
  resolveRunpodCredentials,
} from './config.js'
export * from './errors.js'
export {
  countPasses,
  planInterpolationPasses,
  runInterpolationPasses,
  type InterpolationPass,
} from './interpolation/scheduler.js'
export {
  createRifeInterpolator,
  type FrameInterpolator,
  listInterpolationModels,
} from './interpolation/rife.js'
export { type AppLogger, createAppLogging } from './logging/logger.js'
export { createFfmpegToolkit } from './media/ffmpeg.js'
export { parseProbeOutput, probeMedia } from './media/probe.js'
export type { MediaInfo, MediaToolkit } from './media/types.js'
export { runContinuationPipeline, type ContinuationOptions } from './pipeline/continuation.js'
export { launchPipeline, type PipelineHandle } from './pipeline/launch.js'
export { runSlowMotionPipeline, type SlowMotionOptions } from './pipeline/slowmo.js'
export type { PipelineControl, PipelineResult } from './pipeline/types.js'
export {
  createStageProgress,
  type ProgressEvent,
  type ProgressSink,
  type Stage,
} from './progress/aggregator.js'
export { parseProgressLine } from './progress/parse.js'
export { runProcess } from './process/run-process.js'
export { generateContinuation } from './remote/generate.js'
export { runRemoteJob, type RemoteJob, type RemoteJobState } from './remote/job.js'
export { normalizeResult, type ResultPayload } from './remote/result.js'
export { createRunpodClient, type RemoteJobClient } from './remote/runpod.js'
export { createScratchSpace, withScratchSpace, type ScratchSpace } from './temp/scratch.js'
