import path from 'node:path'

import { Logger } from 'tslog'

import type { FramestretchConfig, LoggingFormat, LoggingLevel } from '../config.js'

import { createRingFileWriter, type RingFileWriter } from './ring-file.js'

export type AppLogger = Logger<Record<string, unknown>>

export type FileLoggingConfig = {
  level: LoggingLevel
  format: LoggingFormat
  file: string
  maxBytes: number
  maxFiles: number
}

export type AppLogging = {
  logger: AppLogger | null
  fileConfig: FileLoggingConfig | null
  getSubLogger: (name: string) => AppLogger | null
  flush: () => Promise<void>
}

const DEFAULT_LOG_LEVEL: LoggingLevel = 'info'
const DEFAULT_LOG_FORMAT: LoggingFormat = 'json'
const DEFAULT_LOG_MAX_MB = 10
const DEFAULT_LOG_MAX_FILES = 3

const LOG_LEVEL_MAP: Record<LoggingLevel, number> = {
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
}

function safeJsonStringify(value: unknown): string {
  const seen = new WeakSet<object>()
  return JSON.stringify(value, (_key, val: unknown) => {
    if (typeof val === 'bigint') return val.toString()
    if (val instanceof Error) {
      return { name: val.name, message: val.message, stack: val.stack, cause: val.cause }
    }
    if (typeof val === 'object' && val !== null) {
      if (seen.has(val)) return '[Circular]'
      seen.add(val)
    }
    return val
  })
}

function formatPrettyLine(metaMarkup: string, args: unknown[], errors: string[]): string {
  const parts: string[] = []
  const meta = metaMarkup.trim()
  if (meta) parts.push(meta)
  if (args.length > 0) {
    parts.push(args.map((arg) => (typeof arg === 'string' ? arg : safeJsonStringify(arg))).join(' '))
  }
  const base = parts.join(' ')
  if (errors.length === 0) return base
  const errorBlock = errors.join('\n')
  return base ? `${base}\n${errorBlock}` : errorBlock
}

export function resolveFileLoggingConfig({
  env,
  config,
}: {
  env: Record<string, string | undefined>
  config: FramestretchConfig | null
}): FileLoggingConfig | null {
  const logging = config?.logging
  if (!logging || logging.enabled !== true) return null

  const home = env.HOME?.trim() || env.USERPROFILE?.trim() || '.'
  const file = logging.file ?? path.join(home, '.framestretch', 'logs', 'framestretch.jsonl')
  const maxMb = logging.maxMb ?? DEFAULT_LOG_MAX_MB
  return {
    level: logging.level ?? DEFAULT_LOG_LEVEL,
    format: logging.format ?? DEFAULT_LOG_FORMAT,
    file,
    maxBytes: Math.trunc(maxMb * 1024 * 1024),
    maxFiles: logging.maxFiles ?? DEFAULT_LOG_MAX_FILES,
  }
}

/**
 * Builds the process logger. Two optional sinks: the rotating log file from config, and
 * stderr when `verbose` is set. With neither, there is no logger and components stay
 * silent.
 */
export function createAppLogging({
  env,
  config,
  verbose = false,
  stderr,
}: {
  env: Record<string, string | undefined>
  config: FramestretchConfig | null
  verbose?: boolean
  stderr?: NodeJS.WritableStream | null
}): AppLogging {
  const fileConfig = resolveFileLoggingConfig({ env, config })
  const consoleStream = verbose && stderr ? stderr : null
  if (!fileConfig && !consoleStream) {
    return { logger: null, fileConfig: null, getSubLogger: () => null, flush: async () => {} }
  }

  const writer: RingFileWriter | null = fileConfig
    ? createRingFileWriter({
        filePath: fileConfig.file,
        maxBytes: fileConfig.maxBytes,
        maxFiles: fileConfig.maxFiles,
      })
    : null

  const fileLevel = fileConfig ? LOG_LEVEL_MAP[fileConfig.level] : Number.POSITIVE_INFINITY
  const minLevel = consoleStream ? LOG_LEVEL_MAP.debug : fileLevel
  const baseSettings = {
    name: 'framestretch',
    minLevel,
    hideLogPositionForProduction: true,
    metaProperty: '_meta',
  }

  const logger =
    fileConfig?.format === 'json'
      ? new Logger<Record<string, unknown>>({
          ...baseSettings,
          type: 'json',
          overwrite: {
            transportJSON: (json) => {
              const line = safeJsonStringify(json)
              writer?.write(line)
              consoleStream?.write(`${line}\n`)
            },
          },
        })
      : new Logger<Record<string, unknown>>({
          ...baseSettings,
          type: 'pretty',
          overwrite: {
            transportFormatted: (metaMarkup, args, errors) => {
              const line = formatPrettyLine(metaMarkup, args, errors)
              writer?.write(line)
              consoleStream?.write(`${line}\n`)
            },
          },
        })

  return {
    logger,
    fileConfig,
    getSubLogger: (name) => logger.getSubLogger({ name }),
    flush: async () => {
      await writer?.flush()
    },
  }
}
