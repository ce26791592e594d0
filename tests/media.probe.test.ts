import { EventEmitter } from 'node:events'
import { mkdtempSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { PassThrough } from 'node:stream'
import { beforeEach, describe, expect, it, vi } from 'vitest'

const spawnMock = vi.hoisted(() => vi.fn())

vi.mock('node:child_process', () => ({ spawn: spawnMock }))

import {
  MediaNotFoundError,
  NoVideoStreamError,
  ParseFailureError,
} from '../src/errors.js'
import { parseFrameRate, parseProbeOutput, probeMedia } from '../src/media/probe.js'

const probeJson = (stream: Record<string, unknown>, format: Record<string, unknown> = {}) =>
  JSON.stringify({
    streams: [{ codec_type: 'audio', codec_name: 'aac' }, { codec_type: 'video', ...stream }],
    format,
  })

describe('frame rate parsing', () => {
  it('handles rational and decimal forms', () => {
    expect(parseFrameRate('30000/1001')).toBeCloseTo(29.97, 2)
    expect(parseFrameRate('25')).toBe(25)
    expect(parseFrameRate('0/0')).toBeNull()
    expect(parseFrameRate('')).toBeNull()
    expect(parseFrameRate(24)).toBe(24)
  })
})

describe('probe output parsing', () => {
  it('reads the first video stream', () => {
    const info = parseProbeOutput(
      probeJson({
        codec_name: 'h264',
        width: 1920,
        height: 1080,
        r_frame_rate: '30000/1001',
        avg_frame_rate: '30000/1001',
        duration: '10.010000',
        nb_frames: '300',
      }),
      'clip.mp4'
    )
    expect(info.width).toBe(1920)
    expect(info.height).toBe(1080)
    expect(Math.abs(info.fps - 29.97)).toBeLessThan(0.01)
    expect(info.duration).toBeCloseTo(10.01, 5)
    expect(info.frameCount).toBe(300)
    expect(info.codec).toBe('h264')
  })

  it('keeps a decimal-only frame rate exact', () => {
    const info = parseProbeOutput(probeJson({ r_frame_rate: '25', duration: '4' }), 'clip.mp4')
    expect(info.fps).toBe(25)
  })

  it('prefers a rational rate over a decimal one', () => {
    const info = parseProbeOutput(
      probeJson({ r_frame_rate: '50', avg_frame_rate: '24000/1001', duration: '1' }),
      'clip.mp4'
    )
    expect(info.fps).toBeCloseTo(23.976, 3)
  })

  it('derives the frame count from fps and duration when not reported', () => {
    const info = parseProbeOutput(
      probeJson({ codec_name: 'vp9', width: 640, height: 360, r_frame_rate: '24/1' }, { duration: '2.5' }),
      'clip.webm'
    )
    expect(info.duration).toBe(2.5)
    expect(info.frameCount).toBe(60)
  })

  it('fails without a video stream', () => {
    const raw = JSON.stringify({ streams: [{ codec_type: 'audio' }], format: {} })
    expect(() => parseProbeOutput(raw, 'song.mp4')).toThrow(NoVideoStreamError)
    expect(() => parseProbeOutput(raw, 'song.mp4')).toThrow('No video stream found in song.mp4')
  })

  it('fails on unreadable output', () => {
    expect(() => parseProbeOutput('not json', 'clip.mp4')).toThrow(ParseFailureError)
    expect(() => parseProbeOutput('[]', 'clip.mp4')).toThrow(ParseFailureError)
  })
})

describe('probeMedia', () => {
  beforeEach(() => {
    spawnMock.mockReset()
  })

  it('rejects a missing input before running the probe', async () => {
    await expect(
      probeMedia({ ffprobePath: 'ffprobe', inputPath: '/nonexistent/clip.mp4' })
    ).rejects.toThrow(MediaNotFoundError)
    expect(spawnMock).not.toHaveBeenCalled()
  })

  it('runs ffprobe with structured output flags', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'framestretch-probe-'))
    const inputPath = join(dir, 'clip.mp4')
    writeFileSync(inputPath, 'not really a video')

    spawnMock.mockImplementation(() => {
      const proc = Object.assign(new EventEmitter(), {
        stdout: new PassThrough(),
        stderr: new PassThrough(),
        kill: vi.fn(),
      })
      process.nextTick(() => {
        proc.stdout.end(probeJson({ width: 320, height: 240, r_frame_rate: '30/1', nb_frames: '90' }))
        proc.stderr.end()
        setImmediate(() => proc.emit('close', 0, null))
      })
      return proc
    })

    const info = await probeMedia({ ffprobePath: '/usr/bin/ffprobe', inputPath })

    expect(info).toMatchObject({ width: 320, height: 240, fps: 30, frameCount: 90 })
    expect(spawnMock.mock.calls[0]?.[0]).toBe('/usr/bin/ffprobe')
    expect(spawnMock.mock.calls[0]?.[1]).toEqual([
      '-v',
      'quiet',
      '-print_format',
      'json',
      '-show_streams',
      '-show_format',
      inputPath,
    ])
  })
})
