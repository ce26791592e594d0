import type { PipelineResult } from './types.js'

export type PipelineHandle = {
  result: Promise<PipelineResult>
  /** Requests cooperative cancellation; observed at the next progress point or poll. */
  cancel: () => void
  readonly cancelRequested: boolean
}

/**
 * Starts a pipeline as its own task. The abort signal is the only state shared with the
 * caller: the caller writes it once through `cancel`, the pipeline only reads it.
 */
export function launchPipeline(run: (signal: AbortSignal) => Promise<PipelineResult>): PipelineHandle {
  const controller = new AbortController()
  const result = Promise.resolve().then(() => run(controller.signal))
  return {
    result,
    cancel: () => controller.abort(),
    get cancelRequested() {
      return controller.signal.aborted
    },
  }
}
