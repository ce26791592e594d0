import { promises as fs } from 'node:fs'

import { MediaNotFoundError, NoVideoStreamError, ParseFailureError } from '../errors.js'
import type { AppLogger } from '../logging/logger.js'
import { runProcessCapture } from '../process/run-process.js'
import type { MediaInfo } from './types.js'

const PROBE_TIMEOUT_MS = 30_000
const FALLBACK_FPS = 30

type ProbeStream = {
  codec_type?: unknown
  codec_name?: unknown
  width?: unknown
  height?: unknown
  r_frame_rate?: unknown
  avg_frame_rate?: unknown
  duration?: unknown
  nb_frames?: unknown
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function toPositiveNumber(raw: unknown): number | null {
  const value = typeof raw === 'string' ? Number(raw.trim()) : raw
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : null
}

function toPositiveInt(raw: unknown): number | null {
  const value = toPositiveNumber(raw)
  return value == null ? null : Math.trunc(value)
}

/** "30000/1001" or "25" → frames per second; null when unusable (e.g. "0/0"). */
export function parseFrameRate(raw: unknown): number | null {
  if (typeof raw === 'number') return toPositiveNumber(raw)
  if (typeof raw !== 'string') return null
  const trimmed = raw.trim()
  if (!trimmed) return null
  if (trimmed.includes('/')) {
    const [numRaw, denRaw] = trimmed.split('/')
    const num = Number(numRaw)
    const den = Number(denRaw)
    if (!Number.isFinite(num) || !Number.isFinite(den) || den === 0) return null
    return toPositiveNumber(num / den)
  }
  return toPositiveNumber(trimmed)
}

function resolveFps(stream: ProbeStream): number {
  const candidates = [stream.r_frame_rate, stream.avg_frame_rate]
  const rational = candidates.find(
    (candidate) =>
      typeof candidate === 'string' && candidate.includes('/') && parseFrameRate(candidate) != null
  )
  if (rational != null) return parseFrameRate(rational) ?? FALLBACK_FPS
  for (const candidate of candidates) {
    const parsed = parseFrameRate(candidate)
    if (parsed != null) return parsed
  }
  return FALLBACK_FPS
}

/** Turns ffprobe `-print_format json -show_streams -show_format` output into MediaInfo. */
export function parseProbeOutput(raw: string, inputPath: string): MediaInfo {
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new ParseFailureError(`Could not parse ffprobe output for ${inputPath}: ${message}`, {
      cause: error,
    })
  }
  if (!isRecord(parsed)) {
    throw new ParseFailureError(`Unexpected ffprobe output for ${inputPath}`)
  }

  const streams: unknown[] = Array.isArray(parsed.streams) ? parsed.streams : []
  const video = streams.find(
    (stream): stream is ProbeStream => isRecord(stream) && stream.codec_type === 'video'
  )
  if (!video) {
    throw new NoVideoStreamError(inputPath)
  }

  const fps = resolveFps(video)
  const format = isRecord(parsed.format) ? parsed.format : {}
  const duration = toPositiveNumber(video.duration) ?? toPositiveNumber(format.duration) ?? 0
  const frameCount = toPositiveInt(video.nb_frames) ?? Math.round(fps * duration)

  return {
    width: toPositiveInt(video.width) ?? 0,
    height: toPositiveInt(video.height) ?? 0,
    fps,
    duration,
    frameCount,
    codec: typeof video.codec_name === 'string' && video.codec_name ? video.codec_name : 'unknown',
  }
}

export async function probeMedia({
  ffprobePath,
  inputPath,
  logger,
}: {
  ffprobePath: string
  inputPath: string
  logger?: AppLogger | null
}): Promise<MediaInfo> {
  const stat = await fs.stat(inputPath).catch(() => null)
  if (!stat?.isFile()) {
    throw new MediaNotFoundError(inputPath)
  }
  const args = ['-v', 'quiet', '-print_format', 'json', '-show_streams', '-show_format', inputPath]
  const output = await runProcessCapture({
    command: ffprobePath,
    args,
    label: 'ffprobe',
    timeoutMs: PROBE_TIMEOUT_MS,
  })
  const info = parseProbeOutput(output, inputPath)
  logger?.debug('probed', { inputPath, ...info })
  return info
}
