import type { AppLogger } from '../logging/logger.js'
import { type JobProgress, runRemoteJob } from './job.js'
import { type ResultPayload, saveResult } from './result.js'
import { type ContinuationInput, encodeImageBase64, type RemoteJobClient } from './runpod.js'

export const DEFAULT_NEGATIVE_PROMPT = 'blurry, low quality, distorted, inconsistent'
export const DEFAULT_INFERENCE_STEPS = 50
export const DEFAULT_GUIDANCE_SCALE = 6.0
export const DEFAULT_NUM_FRAMES = 49
export const MIN_NUM_FRAMES = 9
export const DEFAULT_CONTINUATION_SECONDS = 6
const FRAMES_PER_SECOND = 8

export type ContinuationRequest = {
  imagePath: string
  prompt: string
  negativePrompt?: string | null
  numFrames?: number | null
  steps?: number | null
  guidanceScale?: number | null
}

export type JobTiming = {
  timeoutSeconds?: number
  pollIntervalSeconds?: number
  expectedSeconds?: number
  now?: () => number
  sleep?: (ms: number) => Promise<unknown>
}

/** 8 generated frames per second plus the conditioning frame, within the model's 9..49. */
export function framesForDuration(seconds: number): number {
  if (!Number.isFinite(seconds)) return DEFAULT_NUM_FRAMES
  const frames = Math.round(seconds * FRAMES_PER_SECOND) + 1
  return Math.min(DEFAULT_NUM_FRAMES, Math.max(MIN_NUM_FRAMES, frames))
}

export function buildContinuationInput(
  request: ContinuationRequest,
  image: string
): ContinuationInput {
  return {
    image,
    prompt: request.prompt,
    negative_prompt: request.negativePrompt?.trim() || DEFAULT_NEGATIVE_PROMPT,
    num_frames: request.numFrames ?? DEFAULT_NUM_FRAMES,
    num_inference_steps: request.steps ?? DEFAULT_INFERENCE_STEPS,
    guidance_scale: request.guidanceScale ?? DEFAULT_GUIDANCE_SCALE,
  }
}

/**
 * Encodes the conditioning frame, runs the remote job and writes its result to
 * `outputPath`. Progress is local to this call: 0.05 encoding, 0.10 submitting,
 * polling estimates up to 0.85, 0.90 saving, 1.0 done.
 */
export async function generateContinuation({
  client,
  request,
  outputPath,
  fetchImpl,
  timing,
  signal,
  onProgress,
  logger,
}: {
  client: RemoteJobClient
  request: ContinuationRequest
  outputPath: string
  fetchImpl: typeof fetch
  timing?: JobTiming | null
  signal?: AbortSignal | null
  onProgress?: JobProgress | null
  logger?: AppLogger | null
}): Promise<ResultPayload> {
  onProgress?.('Encoding image...', 0.05)
  const image = await encodeImageBase64(request.imagePath)

  onProgress?.('Submitting job...', 0.1)
  const { job, output } = await runRemoteJob({
    client,
    input: buildContinuationInput(request, image),
    ...timing,
    signal,
    onProgress,
    logger,
  })

  onProgress?.('Saving result...', 0.9)
  const saved = await saveResult({ payload: output, outputPath, fetchImpl })
  logger?.info('remote job finished', {
    id: job.id,
    elapsedSeconds: job.elapsedSeconds,
    result: saved.kind,
  })

  onProgress?.('Complete!', 1)
  return saved
}
