import { promises as fs } from 'node:fs'
import path from 'node:path'

import { RemoteRequestError, UnknownResponseFormatError } from '../errors.js'

const DOWNLOAD_TIMEOUT_MS = 60_000

export type ResultShape =
  | { kind: 'url'; url: string }
  | { kind: 'inline'; base64: string }
  | { kind: 'nested'; base64: string }
  | { kind: 'unrecognized'; detail: string }

export type ResultPayload =
  | { kind: 'reference'; url: string }
  | { kind: 'bytes'; bytes: Buffer }

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function nonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0
}

function describeValue(value: unknown): string {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'array'
  if (isRecord(value)) {
    const keys = Object.keys(value)
    return keys.length > 0 ? `keys: ${keys.join(', ')}` : 'empty object'
  }
  return typeof value
}

/**
 * Accepted completion payloads:
 *   { video_url: "https://..." }        → url
 *   { video: "<base64>" }               → inline
 *   "<base64>"                          → inline
 *   { output: { video: "<base64>" } }   → nested
 *   { output: "<base64>" }              → nested
 */
export function detectResultShape(payload: unknown): ResultShape {
  if (nonEmptyString(payload)) return { kind: 'inline', base64: payload }
  if (!isRecord(payload)) {
    return { kind: 'unrecognized', detail: `unexpected result type ${describeValue(payload)}` }
  }
  const videoUrl = payload.video_url
  if (nonEmptyString(videoUrl)) return { kind: 'url', url: videoUrl.trim() }
  const video = payload.video
  if (nonEmptyString(video)) return { kind: 'inline', base64: video }
  if ('output' in payload) {
    const output = payload.output
    if (nonEmptyString(output)) return { kind: 'nested', base64: output }
    const nestedVideo = isRecord(output) ? output.video : undefined
    if (nonEmptyString(nestedVideo)) return { kind: 'nested', base64: nestedVideo }
    return { kind: 'unrecognized', detail: `unexpected output format (${describeValue(output)})` }
  }
  return { kind: 'unrecognized', detail: describeValue(payload) }
}

export function decodeBase64Payload(base64: string): Buffer {
  const cleaned = base64.replace(/^data:[^;]+;base64,/, '').replace(/\s+/g, '')
  if (!/^[A-Za-z0-9+/_-]*={0,2}$/.test(cleaned)) {
    throw new UnknownResponseFormatError('payload is not valid base64')
  }
  return Buffer.from(cleaned, 'base64')
}

/** Collapses the accepted shapes into raw bytes or a reference to fetch. */
export function normalizeResult(payload: unknown): ResultPayload {
  const shape = detectResultShape(payload)
  switch (shape.kind) {
    case 'url':
      return { kind: 'reference', url: shape.url }
    case 'inline':
    case 'nested':
      return { kind: 'bytes', bytes: decodeBase64Payload(shape.base64) }
    case 'unrecognized':
      throw new UnknownResponseFormatError(shape.detail)
  }
}

export async function downloadToFile({
  url,
  outputPath,
  fetchImpl,
  timeoutMs = DOWNLOAD_TIMEOUT_MS,
}: {
  url: string
  outputPath: string
  fetchImpl: typeof fetch
  timeoutMs?: number
}): Promise<void> {
  const controller = new AbortController()
  const timeout = setTimeout(() => controller.abort(), timeoutMs)
  try {
    const res = await fetchImpl(url, { signal: controller.signal })
    if (!res.ok) {
      throw new RemoteRequestError(res.status, `Download failed: ${res.status} ${res.statusText}`)
    }
    const bytes = Buffer.from(await res.arrayBuffer())
    await fs.writeFile(outputPath, bytes)
  } finally {
    clearTimeout(timeout)
  }
}

/** Writes the job result to `outputPath`, fetching it first when it is a reference. */
export async function saveResult({
  payload,
  outputPath,
  fetchImpl,
}: {
  payload: unknown
  outputPath: string
  fetchImpl: typeof fetch
}): Promise<ResultPayload> {
  const normalized = normalizeResult(payload)
  await fs.mkdir(path.dirname(outputPath), { recursive: true })
  if (normalized.kind === 'reference') {
    await downloadToFile({ url: normalized.url, outputPath, fetchImpl })
  } else {
    await fs.writeFile(outputPath, normalized.bytes)
  }
  return normalized
}
