import { readFileSync } from 'node:fs'
import { join } from 'node:path'

import JSON5 from 'json5'

export type LoggingLevel = 'debug' | 'info' | 'warn' | 'error'
export type LoggingFormat = 'json' | 'pretty'
export type LoggingConfig = {
  enabled?: boolean
  level?: LoggingLevel
  format?: LoggingFormat
  file?: string
  maxMb?: number
  maxFiles?: number
}

export type RunpodConfig = {
  apiKey?: string
  endpointId?: string
  /**
   * Override the RunPod API base URL (e.g. a proxy).
   *
   * Default: https://api.runpod.ai
   */
  baseUrl?: string
  /** Wall-clock limit for one remote job. Default: 300. */
  timeoutSeconds?: number
  /** Delay between status polls. Default: 2. */
  pollIntervalSeconds?: number
}

export type ToolsConfig = {
  ffmpeg?: string
  ffprobe?: string
  rife?: string
  /** Directory holding the rife-* model folders (default: next to the rife binary). */
  rifeModelsDir?: string
}

export type SlowmoConfig = {
  multiplier?: number
  model?: string
  gpu?: number
  /** x264 CRF for the reassembled video. */
  quality?: number
}

export type FramestretchConfig = {
  runpod?: RunpodConfig
  tools?: ToolsConfig
  slowmo?: SlowmoConfig
  /** Root for per-job scratch directories. */
  tempDir?: string
  logging?: LoggingConfig
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function parseOptionalString(raw: unknown, path: string, label: string): string | undefined {
  if (typeof raw === 'undefined') return undefined
  if (typeof raw !== 'string') {
    throw new Error(`Invalid config file ${path}: "${label}" must be a string.`)
  }
  const trimmed = raw.trim()
  return trimmed.length > 0 ? trimmed : undefined
}

function parseOptionalPositiveNumber(
  raw: unknown,
  path: string,
  label: string
): number | undefined {
  if (typeof raw === 'undefined') return undefined
  if (typeof raw !== 'number' || !Number.isFinite(raw) || raw <= 0) {
    throw new Error(`Invalid config file ${path}: "${label}" must be a positive number.`)
  }
  return raw
}

function parseOptionalSection(
  raw: unknown,
  path: string,
  label: string
): Record<string, unknown> | undefined {
  if (typeof raw === 'undefined') return undefined
  if (!isRecord(raw)) {
    throw new Error(`Invalid config file ${path}: "${label}" must be an object.`)
  }
  return raw
}

function parseLoggingLevel(raw: unknown, path: string): LoggingLevel {
  if (typeof raw !== 'string') {
    throw new Error(`Invalid config file ${path}: "logging.level" must be a string.`)
  }
  const trimmed = raw.trim().toLowerCase()
  if (trimmed === 'debug' || trimmed === 'info' || trimmed === 'warn' || trimmed === 'error') {
    return trimmed
  }
  throw new Error(
    `Invalid config file ${path}: "logging.level" must be one of "debug", "info", "warn", "error".`
  )
}

function parseLoggingFormat(raw: unknown, path: string): LoggingFormat {
  if (typeof raw !== 'string') {
    throw new Error(`Invalid config file ${path}: "logging.format" must be a string.`)
  }
  const trimmed = raw.trim().toLowerCase()
  if (trimmed === 'json' || trimmed === 'pretty') {
    return trimmed
  }
  throw new Error(
    `Invalid config file ${path}: "logging.format" must be one of "json" or "pretty".`
  )
}

function assertNoComments(raw: string, path: string): void {
  let inString: '"' | "'" | null = null
  let escaped = false
  let line = 1
  let col = 1

  for (let i = 0; i < raw.length; i += 1) {
    const ch = raw[i] ?? ''
    const next = raw[i + 1] ?? ''

    if (inString) {
      if (escaped) {
        escaped = false
      } else if (ch === '\\') {
        escaped = true
      } else if (ch === inString) {
        inString = null
      }
    } else if (ch === '"' || ch === "'") {
      inString = ch
    } else if (ch === '/' && (next === '/' || next === '*')) {
      throw new Error(
        `Invalid config file ${path}: comments are not allowed (found /${next} at ${line}:${col}).`
      )
    }

    if (ch === '\n') {
      line += 1
      col = 1
    } else {
      col += 1
    }
  }
}

export function resolveConfigPath(env: Record<string, string | undefined>): string | null {
  const home = env.HOME?.trim() || env.USERPROFILE?.trim() || null
  if (!home) return null
  return join(home, '.framestretch', 'config.json')
}

export function loadFramestretchConfig({ env }: { env: Record<string, string | undefined> }): {
  config: FramestretchConfig | null
  path: string | null
} {
  const path = resolveConfigPath(env)
  if (!path) return { config: null, path: null }

  let raw: string
  try {
    raw = readFileSync(path, 'utf8')
  } catch {
    return { config: null, path }
  }

  let parsed: unknown
  assertNoComments(raw, path)
  try {
    parsed = JSON5.parse(raw)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new Error(`Invalid JSON in config file ${path}: ${message}`)
  }

  if (!isRecord(parsed)) {
    throw new Error(`Invalid config file ${path}: expected an object at the top level`)
  }

  const runpod = (() => {
    const value = parseOptionalSection(parsed.runpod, path, 'runpod')
    if (!value) return undefined
    const apiKey = parseOptionalString(value.apiKey, path, 'runpod.apiKey')
    const endpointId = parseOptionalString(value.endpointId, path, 'runpod.endpointId')
    const baseUrl = parseOptionalString(value.baseUrl, path, 'runpod.baseUrl')
    const timeoutSeconds = parseOptionalPositiveNumber(
      value.timeoutSeconds,
      path,
      'runpod.timeoutSeconds'
    )
    const pollIntervalSeconds = parseOptionalPositiveNumber(
      value.pollIntervalSeconds,
      path,
      'runpod.pollIntervalSeconds'
    )
    return {
      ...(apiKey ? { apiKey } : {}),
      ...(endpointId ? { endpointId } : {}),
      ...(baseUrl ? { baseUrl } : {}),
      ...(typeof timeoutSeconds === 'number' ? { timeoutSeconds } : {}),
      ...(typeof pollIntervalSeconds === 'number' ? { pollIntervalSeconds } : {}),
    } satisfies RunpodConfig
  })()

  const tools = (() => {
    const value = parseOptionalSection(parsed.tools, path, 'tools')
    if (!value) return undefined
    const ffmpeg = parseOptionalString(value.ffmpeg, path, 'tools.ffmpeg')
    const ffprobe = parseOptionalString(value.ffprobe, path, 'tools.ffprobe')
    const rife = parseOptionalString(value.rife, path, 'tools.rife')
    const rifeModelsDir = parseOptionalString(value.rifeModelsDir, path, 'tools.rifeModelsDir')
    return {
      ...(ffmpeg ? { ffmpeg } : {}),
      ...(ffprobe ? { ffprobe } : {}),
      ...(rife ? { rife } : {}),
      ...(rifeModelsDir ? { rifeModelsDir } : {}),
    } satisfies ToolsConfig
  })()

  const slowmo = (() => {
    const value = parseOptionalSection(parsed.slowmo, path, 'slowmo')
    if (!value) return undefined
    const multiplier = parseOptionalPositiveNumber(value.multiplier, path, 'slowmo.multiplier')
    if (typeof multiplier === 'number' && (!Number.isInteger(multiplier) || multiplier < 2)) {
      throw new Error(`Invalid config file ${path}: "slowmo.multiplier" must be an integer >= 2.`)
    }
    const model = parseOptionalString(value.model, path, 'slowmo.model')
    const gpu = (() => {
      const raw = value.gpu
      if (typeof raw === 'undefined') return undefined
      if (typeof raw !== 'number' || !Number.isInteger(raw) || raw < -1) {
        throw new Error(`Invalid config file ${path}: "slowmo.gpu" must be an integer >= -1.`)
      }
      return raw
    })()
    const quality = (() => {
      const raw = value.quality
      if (typeof raw === 'undefined') return undefined
      if (typeof raw !== 'number' || !Number.isInteger(raw) || raw < 0 || raw > 51) {
        throw new Error(`Invalid config file ${path}: "slowmo.quality" must be an integer 0-51.`)
      }
      return raw
    })()
    return {
      ...(typeof multiplier === 'number' ? { multiplier } : {}),
      ...(model ? { model } : {}),
      ...(typeof gpu === 'number' ? { gpu } : {}),
      ...(typeof quality === 'number' ? { quality } : {}),
    } satisfies SlowmoConfig
  })()

  const tempDir = parseOptionalString(parsed.tempDir, path, 'tempDir')

  const logging = (() => {
    const value = parseOptionalSection(parsed.logging, path, 'logging')
    if (!value) return undefined
    const enabled = typeof value.enabled === 'boolean' ? value.enabled : undefined
    const level =
      typeof value.level === 'undefined' ? undefined : parseLoggingLevel(value.level, path)
    const format =
      typeof value.format === 'undefined' ? undefined : parseLoggingFormat(value.format, path)
    const file = parseOptionalString(value.file, path, 'logging.file')
    const maxMb = parseOptionalPositiveNumber(value.maxMb, path, 'logging.maxMb')
    const maxFilesRaw = parseOptionalPositiveNumber(value.maxFiles, path, 'logging.maxFiles')
    const maxFiles = typeof maxFilesRaw === 'number' ? Math.trunc(maxFilesRaw) : undefined
    return {
      ...(typeof enabled === 'boolean' ? { enabled } : {}),
      ...(level ? { level } : {}),
      ...(format ? { format } : {}),
      ...(file ? { file } : {}),
      ...(typeof maxMb === 'number' ? { maxMb } : {}),
      ...(typeof maxFiles === 'number' ? { maxFiles } : {}),
    } satisfies LoggingConfig
  })()

  return {
    config: {
      ...(runpod ? { runpod } : {}),
      ...(tools ? { tools } : {}),
      ...(slowmo ? { slowmo } : {}),
      ...(tempDir ? { tempDir } : {}),
      ...(logging ? { logging } : {}),
    },
    path,
  }
}

export type RunpodCredentials = {
  apiKey: string | null
  endpointId: string | null
}

/**
 * Explicit value > environment > config file, resolved per secret. Blank strings count
 * as unset so an empty flag does not mask the environment.
 */
export function resolveRunpodCredentials({
  explicit,
  env,
  config,
}: {
  explicit?: { apiKey?: string | null; endpointId?: string | null } | null
  env: Record<string, string | undefined>
  config: FramestretchConfig | null
}): RunpodCredentials {
  const pick = (...values: Array<string | null | undefined>) => {
    for (const value of values) {
      const trimmed = value?.trim()
      if (trimmed) return trimmed
    }
    return null
  }
  return {
    apiKey: pick(explicit?.apiKey, env.RUNPOD_API_KEY, config?.runpod?.apiKey),
    endpointId: pick(explicit?.endpointId, env.RUNPOD_ENDPOINT_ID, config?.runpod?.endpointId),
  }
}
