import { describe, expect, it } from 'vitest'

import { InvalidInputError } from '../src/errors.js'
import {
  parseContinuationSecondsArg,
  parseFpsArg,
  parseGpuArg,
  parseGuidanceArg,
  parseMultiplierArg,
  parseQualityArg,
  parseStepsArg,
  parseTimeoutSecondsArg,
} from '../src/flags.js'

describe('cli flag parsing', () => {
  it('parses --multiplier', () => {
    expect(parseMultiplierArg('8')).toBe(8)
    expect(parseMultiplierArg(' 3 ')).toBe(3)
    expect(() => parseMultiplierArg('1')).toThrow('Unsupported --multiplier: 1 (integer >= 2)')
    expect(() => parseMultiplierArg('2.5')).toThrow(InvalidInputError)
    expect(() => parseMultiplierArg('')).toThrow('Unsupported --multiplier: ')
  })

  it('parses --gpu', () => {
    expect(parseGpuArg('-1')).toBe(-1)
    expect(parseGpuArg('1')).toBe(1)
    expect(() => parseGpuArg('-2')).toThrow(/Unsupported --gpu: -2/)
  })

  it('parses --fps and --quality', () => {
    expect(parseFpsArg('59.94')).toBe(59.94)
    expect(() => parseFpsArg('0')).toThrow('Unsupported --fps: 0 (range 0-1000)')
    expect(parseQualityArg('0')).toBe(0)
    expect(parseQualityArg('51')).toBe(51)
    expect(() => parseQualityArg('52')).toThrow('Unsupported --quality: 52 (CRF 0-51)')
  })

  it('parses --duration in seconds', () => {
    expect(parseContinuationSecondsArg('6')).toBe(6)
    expect(parseContinuationSecondsArg('2.5s')).toBe(2.5)
    expect(() => parseContinuationSecondsArg('0.5')).toThrow(
      'Unsupported --duration: 0.5 (range 1-6 seconds)'
    )
    expect(() => parseContinuationSecondsArg('10s')).toThrow(/Unsupported --duration: 10s/)
  })

  it('parses --steps and --guidance', () => {
    expect(parseStepsArg('30')).toBe(30)
    expect(() => parseStepsArg('0')).toThrow('Unsupported --steps: 0 (range 1-200)')
    expect(() => parseStepsArg('12.5')).toThrow(InvalidInputError)
    expect(parseGuidanceArg('7.5')).toBe(7.5)
    expect(() => parseGuidanceArg('31')).toThrow('Unsupported --guidance: 31 (range 0-30)')
  })

  it('parses --timeout durations', () => {
    expect(parseTimeoutSecondsArg('300')).toBe(300)
    expect(parseTimeoutSecondsArg('45s')).toBe(45)
    expect(parseTimeoutSecondsArg('5m')).toBe(300)
    expect(parseTimeoutSecondsArg('1500ms')).toBe(1.5)
    expect(() => parseTimeoutSecondsArg('soon')).toThrow('Unsupported --timeout: soon')
    expect(() => parseTimeoutSecondsArg('0')).toThrow('Unsupported --timeout: 0')
  })
})
