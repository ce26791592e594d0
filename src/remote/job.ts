import { setTimeout as delay } from 'node:timers/promises'

import { JobFailedError, JobTimeoutError, UserCancelledError } from '../errors.js'
import type { AppLogger } from '../logging/logger.js'
import type { ContinuationInput, RemoteJobClient, RemoteStatus } from './runpod.js'

export const DEFAULT_JOB_TIMEOUT_SECONDS = 300
export const DEFAULT_POLL_INTERVAL_SECONDS = 2
export const DEFAULT_EXPECTED_JOB_SECONDS = 120
const MAX_POLL_PROGRESS = 0.85

export type RemoteJobState =
  | 'SUBMITTED'
  | 'RUNNING'
  | 'COMPLETED'
  | 'FAILED'
  | 'CANCELLED'
  | 'TIMED_OUT'

export type RemoteJob = {
  readonly id: string
  readonly state: RemoteJobState
  readonly elapsedSeconds: number
}

export type JobProgress = (label: string, fraction: number) => void

const STATE_RANK: Record<RemoteJobState, number> = {
  SUBMITTED: 0,
  RUNNING: 1,
  COMPLETED: 2,
  FAILED: 2,
  CANCELLED: 2,
  TIMED_OUT: 2,
}

export function isTerminalState(state: RemoteJobState): boolean {
  return STATE_RANK[state] === 2
}

/** Forward-only: a terminal state is final, and nothing moves back to SUBMITTED. */
export function advanceJobState(current: RemoteJobState, next: RemoteJobState): RemoteJobState {
  if (isTerminalState(current)) return current
  return STATE_RANK[next] >= STATE_RANK[current] ? next : current
}

/** Queued and in-progress are both RUNNING; a server-side timeout is a failure. */
export function mapRemoteStatus(status: RemoteStatus): RemoteJobState {
  switch (status) {
    case 'IN_QUEUE':
    case 'IN_PROGRESS':
      return 'RUNNING'
    case 'COMPLETED':
      return 'COMPLETED'
    case 'FAILED':
    case 'TIMED_OUT':
      return 'FAILED'
    case 'CANCELLED':
      return 'CANCELLED'
  }
}

export function estimateJobProgress(elapsedSeconds: number, expectedSeconds: number): number {
  if (!(expectedSeconds > 0)) return MAX_POLL_PROGRESS
  const estimate = 0.15 + (Math.max(0, elapsedSeconds) / expectedSeconds) * 0.7
  return Math.min(MAX_POLL_PROGRESS, estimate)
}

function throwIfCancelled(signal: AbortSignal | null | undefined): void {
  if (signal?.aborted) throw new UserCancelledError()
}

/**
 * Submits one unit of work and polls at a fixed interval until the job reaches a
 * terminal state or the wall-clock guard trips. Resolves with the raw completion
 * payload; every other outcome throws.
 */
export async function runRemoteJob({
  client,
  input,
  timeoutSeconds = DEFAULT_JOB_TIMEOUT_SECONDS,
  pollIntervalSeconds = DEFAULT_POLL_INTERVAL_SECONDS,
  expectedSeconds = DEFAULT_EXPECTED_JOB_SECONDS,
  signal,
  onProgress,
  now = Date.now,
  sleep = (ms) => delay(ms),
  logger,
}: {
  client: RemoteJobClient
  input: ContinuationInput
  timeoutSeconds?: number
  pollIntervalSeconds?: number
  expectedSeconds?: number
  signal?: AbortSignal | null
  onProgress?: JobProgress | null
  now?: () => number
  sleep?: (ms: number) => Promise<unknown>
  logger?: AppLogger | null
}): Promise<{ job: RemoteJob; output: unknown }> {
  throwIfCancelled(signal)
  const submitted = await client.submit(input)
  const startedAt = now()
  let job: RemoteJob = { id: submitted.id, state: 'SUBMITTED', elapsedSeconds: 0 }
  logger?.info('remote job submitted', { id: job.id })

  const transition = (next: RemoteJobState, elapsedSeconds: number) => {
    const state = advanceJobState(job.state, next)
    if (state !== job.state) {
      logger?.debug('remote job state', { id: job.id, from: job.state, to: state, elapsedSeconds })
    }
    job = { id: job.id, state, elapsedSeconds }
  }

  let lastStatus: RemoteStatus | null = null
  for (;;) {
    const elapsed = (now() - startedAt) / 1000
    if (elapsed > timeoutSeconds) {
      transition('TIMED_OUT', elapsed)
      logger?.warn('remote job timed out', { id: job.id, timeoutSeconds })
      throw new JobTimeoutError(timeoutSeconds)
    }
    throwIfCancelled(signal)

    const response = await client.status(job.id)
    const polledAt = (now() - startedAt) / 1000
    transition(mapRemoteStatus(response.status), polledAt)

    if (response.status !== lastStatus) {
      lastStatus = response.status
      onProgress?.(
        `Generating (${response.status})...`,
        estimateJobProgress(polledAt, expectedSeconds)
      )
    }

    switch (job.state) {
      case 'COMPLETED':
        return { job, output: response.output }
      case 'FAILED':
        throw new JobFailedError(
          response.error ??
            (response.status === 'TIMED_OUT' ? 'Job timed out on the server' : 'Unknown error')
        )
      case 'CANCELLED':
        throw new JobFailedError('Job was cancelled')
      default:
        await sleep(pollIntervalSeconds * 1000)
    }
  }
}
