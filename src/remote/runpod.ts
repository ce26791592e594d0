import { promises as fs } from 'node:fs'

import {
  AuthenticationError,
  EndpointNotFoundError,
  ParseFailureError,
  RemoteRequestError,
} from '../errors.js'
import type { AppLogger } from '../logging/logger.js'

export const DEFAULT_RUNPOD_BASE_URL = 'https://api.runpod.ai'
const REQUEST_TIMEOUT_MS = 30_000

export type RemoteStatus =
  | 'IN_QUEUE'
  | 'IN_PROGRESS'
  | 'COMPLETED'
  | 'FAILED'
  | 'CANCELLED'
  | 'TIMED_OUT'

const REMOTE_STATUSES: readonly RemoteStatus[] = [
  'IN_QUEUE',
  'IN_PROGRESS',
  'COMPLETED',
  'FAILED',
  'CANCELLED',
  'TIMED_OUT',
]

export type ContinuationInput = {
  image: string
  prompt: string
  negative_prompt: string
  num_frames: number
  num_inference_steps: number
  guidance_scale: number
}

export type StatusResponse = {
  status: RemoteStatus
  output: unknown
  error: string | null
}

/** The three calls the job state machine needs. */
export type RemoteJobClient = {
  submit: (input: ContinuationInput) => Promise<{ id: string; status: RemoteStatus }>
  status: (jobId: string) => Promise<StatusResponse>
  cancel: (jobId: string) => Promise<void>
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function parseRemoteStatus(raw: unknown): RemoteStatus {
  const found = REMOTE_STATUSES.find((status) => status === raw)
  if (!found) {
    throw new ParseFailureError(`Unexpected RunPod job status: ${JSON.stringify(raw)}`)
  }
  return found
}

function describeRemoteError(raw: unknown): string | null {
  if (typeof raw === 'string') return raw.trim() || null
  if (raw === null || typeof raw === 'undefined') return null
  return JSON.stringify(raw)
}

function withTimeoutSignal(timeoutMs: number): { signal: AbortSignal; cleanup: () => void } {
  const controller = new AbortController()
  const timeout = setTimeout(() => controller.abort(), timeoutMs)
  return { signal: controller.signal, cleanup: () => clearTimeout(timeout) }
}

export async function encodeImageBase64(imagePath: string): Promise<string> {
  const bytes = await fs.readFile(imagePath)
  return bytes.toString('base64')
}

export function createRunpodClient({
  apiKey,
  endpointId,
  baseUrl = DEFAULT_RUNPOD_BASE_URL,
  fetchImpl,
  logger,
}: {
  apiKey: string
  endpointId: string
  baseUrl?: string
  fetchImpl: typeof fetch
  logger?: AppLogger | null
}): RemoteJobClient {
  const root = `${baseUrl.replace(/\/+$/, '')}/v2/${encodeURIComponent(endpointId)}`

  const request = async (
    method: 'GET' | 'POST',
    pathname: string,
    body?: unknown
  ): Promise<Record<string, unknown>> => {
    const { signal, cleanup } = withTimeoutSignal(REQUEST_TIMEOUT_MS)
    try {
      const res = await fetchImpl(`${root}${pathname}`, {
        method,
        headers: {
          Authorization: `Bearer ${apiKey}`,
          ...(body === undefined ? {} : { 'Content-Type': 'application/json' }),
        },
        ...(body === undefined ? {} : { body: JSON.stringify(body) }),
        signal,
      })
      logger?.debug('runpod request', { method, pathname, status: res.status })
      if (res.status === 401 || res.status === 403) {
        throw new AuthenticationError()
      }
      if (res.status === 404) {
        throw new EndpointNotFoundError(endpointId)
      }
      if (!res.ok) {
        let bodyText = ''
        try {
          bodyText = await res.text()
        } catch {
          bodyText = ''
        }
        const snippet = bodyText.trim().slice(0, 200)
        const suffix = snippet.length > 0 ? `: ${snippet}` : ''
        throw new RemoteRequestError(
          res.status,
          `RunPod request failed (${res.status} ${res.statusText})${suffix}`
        )
      }
      let json: unknown
      try {
        json = await res.json()
      } catch (error) {
        throw new ParseFailureError(`RunPod returned invalid JSON for ${pathname}`, { cause: error })
      }
      if (!isRecord(json)) {
        throw new ParseFailureError(`RunPod returned a non-object response for ${pathname}`)
      }
      return json
    } finally {
      cleanup()
    }
  }

  return {
    async submit(input) {
      const json = await request('POST', '/run', { input })
      const id = json.id
      if (typeof id !== 'string' || id.trim().length === 0) {
        throw new ParseFailureError('RunPod did not return a job id')
      }
      return { id, status: parseRemoteStatus(json.status ?? 'IN_QUEUE') }
    },

    async status(jobId) {
      const json = await request('GET', `/status/${encodeURIComponent(jobId)}`)
      return {
        status: parseRemoteStatus(json.status),
        output: json.output,
        error: describeRemoteError(json.error),
      }
    },

    async cancel(jobId) {
      await request('POST', `/cancel/${encodeURIComponent(jobId)}`)
    },
  }
}
