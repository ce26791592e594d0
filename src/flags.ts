import { InvalidInputError } from './errors.js'

export const MULTIPLIER_CHOICES = ['2', '4', '8', '16'] as const

const DURATION_PATTERN = /^(?<value>\d+(?:\.\d+)?)(?<unit>ms|s|m)?$/i
const MIN_STEPS = 1
const MAX_STEPS = 200

function unsupported(flag: string, raw: string, detail?: string): InvalidInputError {
  return new InvalidInputError(`Unsupported ${flag}: ${raw}${detail ? ` (${detail})` : ''}`)
}

function parseNumber(raw: string, flag: string): number {
  const normalized = raw.trim()
  if (!normalized) throw unsupported(flag, raw)
  const numeric = Number(normalized)
  if (!Number.isFinite(numeric)) throw unsupported(flag, raw)
  return numeric
}

export function parseMultiplierArg(raw: string): number {
  const numeric = parseNumber(raw, '--multiplier')
  if (!Number.isInteger(numeric) || numeric < 2) {
    throw unsupported('--multiplier', raw, 'integer >= 2')
  }
  return numeric
}

export function parseGpuArg(raw: string): number {
  const numeric = parseNumber(raw, '--gpu')
  if (!Number.isInteger(numeric) || numeric < -1) {
    throw unsupported('--gpu', raw, '-1 for CPU, otherwise a device index')
  }
  return numeric
}

export function parseFpsArg(raw: string): number {
  const numeric = parseNumber(raw, '--fps')
  if (numeric <= 0 || numeric > 1000) throw unsupported('--fps', raw, 'range 0-1000')
  return numeric
}

export function parseQualityArg(raw: string): number {
  const numeric = parseNumber(raw, '--quality')
  if (!Number.isInteger(numeric) || numeric < 0 || numeric > 51) {
    throw unsupported('--quality', raw, 'CRF 0-51')
  }
  return numeric
}

/** Seconds of generated footage; plain numbers are seconds. */
export function parseContinuationSecondsArg(raw: string): number {
  const numeric = parseNumber(raw.replace(/s$/i, ''), '--duration')
  if (numeric < 1 || numeric > 6) throw unsupported('--duration', raw, 'range 1-6 seconds')
  return numeric
}

export function parseStepsArg(raw: string): number {
  const numeric = parseNumber(raw, '--steps')
  if (!Number.isInteger(numeric) || numeric < MIN_STEPS || numeric > MAX_STEPS) {
    throw unsupported('--steps', raw, `range ${MIN_STEPS}-${MAX_STEPS}`)
  }
  return numeric
}

export function parseGuidanceArg(raw: string): number {
  const numeric = parseNumber(raw, '--guidance')
  if (numeric <= 0 || numeric > 30) throw unsupported('--guidance', raw, 'range 0-30')
  return numeric
}

/** `300`, `300s`, `5m`, `90000ms`; returns seconds. */
export function parseTimeoutSecondsArg(raw: string): number {
  const match = DURATION_PATTERN.exec(raw.trim())
  if (!match?.groups) throw unsupported('--timeout', raw)
  const numeric = Number(match.groups.value)
  if (!Number.isFinite(numeric) || numeric <= 0) throw unsupported('--timeout', raw)
  const unit = match.groups.unit?.toLowerCase() ?? 's'
  const seconds = unit === 'ms' ? numeric / 1000 : unit === 'm' ? numeric * 60 : numeric
  return seconds
}
