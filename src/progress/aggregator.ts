import { UserCancelledError } from '../errors.js'

export type Stage = {
  name: string
  range: readonly [start: number, end: number]
}

export type ProgressEvent = {
  label: string
  globalProgress: number
}

export type ProgressSink = (event: ProgressEvent) => void

export type StageProgress = {
  readonly stages: readonly Stage[]
  report: (stageName: string, localProgress: number, label: string) => void
  complete: (label?: string) => void
  readonly lastProgress: number
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value))
}

/**
 * Rejects stage lists that do not tile [0, 1] exactly: first start 0, last end 1, every
 * start equal to the previous end, no empty or inverted range, no duplicate names.
 */
export function validateStages(stages: readonly Stage[]): void {
  if (stages.length === 0) {
    throw new Error('Stage list must not be empty.')
  }
  const seen = new Set<string>()
  let expectedStart = 0
  for (const stage of stages) {
    const [start, end] = stage.range
    if (seen.has(stage.name)) {
      throw new Error(`Duplicate stage "${stage.name}".`)
    }
    seen.add(stage.name)
    if (!Number.isFinite(start) || !Number.isFinite(end)) {
      throw new Error(`Stage "${stage.name}" has a non-numeric range.`)
    }
    if (start !== expectedStart) {
      throw new Error(
        `Stage "${stage.name}" starts at ${start}, expected ${expectedStart} (ranges must be contiguous).`
      )
    }
    if (end <= start) {
      throw new Error(`Stage "${stage.name}" has an empty or inverted range [${start}, ${end}).`)
    }
    expectedStart = end
  }
  if (expectedStart !== 1) {
    throw new Error(`Stage ranges end at ${expectedStart}, expected 1.`)
  }
}

/**
 * Maps per-stage progress onto one 0..1 scale and forwards it to the sink. Emitted
 * values never decrease. Every report is also the cancellation checkpoint: an aborted
 * signal turns the next report into a `UserCancelledError`. `complete` skips the check;
 * by then the output is already written.
 */
export function createStageProgress({
  stages,
  sink,
  signal,
}: {
  stages: readonly Stage[]
  sink?: ProgressSink | null
  signal?: AbortSignal | null
}): StageProgress {
  validateStages(stages)
  const byName = new Map(stages.map((stage) => [stage.name, stage]))
  let last = 0

  const emit = (label: string, value: number, cancellable = true) => {
    if (cancellable && signal?.aborted) {
      throw new UserCancelledError()
    }
    last = Math.max(last, value)
    sink?.({ label, globalProgress: last })
  }

  return {
    stages,
    report(stageName, localProgress, label) {
      const stage = byName.get(stageName)
      if (!stage) {
        throw new Error(`Unknown stage "${stageName}".`)
      }
      const [start, end] = stage.range
      const local = Number.isFinite(localProgress) ? clamp(localProgress, 0, 1) : 0
      emit(label, start + local * (end - start))
    },
    complete(label = 'Complete!') {
      emit(label, 1, false)
    },
    get lastProgress() {
      return last
    },
  }
}
