import { mkdtempSync, readFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, expect, it, vi } from 'vitest'

import { RemoteRequestError, UnknownResponseFormatError } from '../src/errors.js'
import {
  decodeBase64Payload,
  detectResultShape,
  normalizeResult,
  saveResult,
} from '../src/remote/result.js'

const VIDEO_BYTES = Buffer.from('fake mp4 bytes \u0000\u0001\u0002')
const VIDEO_B64 = VIDEO_BYTES.toString('base64')

describe('result shape detection', () => {
  it('recognizes every accepted shape', () => {
    expect(detectResultShape({ video_url: ' https://cdn.example.com/out.mp4 ' })).toEqual({
      kind: 'url',
      url: 'https://cdn.example.com/out.mp4',
    })
    expect(detectResultShape({ video: VIDEO_B64 })).toEqual({ kind: 'inline', base64: VIDEO_B64 })
    expect(detectResultShape(VIDEO_B64)).toEqual({ kind: 'inline', base64: VIDEO_B64 })
    expect(detectResultShape({ output: { video: VIDEO_B64 } })).toEqual({
      kind: 'nested',
      base64: VIDEO_B64,
    })
    expect(detectResultShape({ output: VIDEO_B64 })).toEqual({ kind: 'nested', base64: VIDEO_B64 })
  })

  it('describes unrecognized payloads', () => {
    expect(detectResultShape({ frames: [] })).toEqual({ kind: 'unrecognized', detail: 'keys: frames' })
    expect(detectResultShape({ output: { images: [] } })).toEqual({
      kind: 'unrecognized',
      detail: 'unexpected output format (keys: images)',
    })
    expect(detectResultShape(null)).toEqual({
      kind: 'unrecognized',
      detail: 'unexpected result type null',
    })
    expect(detectResultShape({})).toEqual({ kind: 'unrecognized', detail: 'empty object' })
  })
})

describe('result normalization', () => {
  it('decodes a nested payload to the original bytes', () => {
    const result = normalizeResult({ output: { video: VIDEO_B64 } })
    expect(result.kind).toBe('bytes')
    if (result.kind === 'bytes') expect(result.bytes.equals(VIDEO_BYTES)).toBe(true)
  })

  it('keeps a url as a reference', () => {
    expect(normalizeResult({ video_url: 'https://cdn.example.com/out.mp4' })).toEqual({
      kind: 'reference',
      url: 'https://cdn.example.com/out.mp4',
    })
  })

  it('fails on an unknown shape', () => {
    expect(() => normalizeResult({ result: 'ok' })).toThrow(UnknownResponseFormatError)
    expect(() => normalizeResult({ result: 'ok' })).toThrow('Unknown response format: keys: result')
  })

  it('strips data url prefixes and rejects garbage', () => {
    expect(decodeBase64Payload(`data:video/mp4;base64,${VIDEO_B64}`).equals(VIDEO_BYTES)).toBe(true)
    expect(() => decodeBase64Payload('not base64 at all!')).toThrow(UnknownResponseFormatError)
  })
})

describe('saving results', () => {
  it('writes decoded bytes', async () => {
    const outputPath = join(mkdtempSync(join(tmpdir(), 'framestretch-result-')), 'out.mp4')
    const fetchImpl = vi.fn<typeof fetch>()

    await saveResult({ payload: { video: VIDEO_B64 }, outputPath, fetchImpl })

    expect(readFileSync(outputPath).equals(VIDEO_BYTES)).toBe(true)
    expect(fetchImpl).not.toHaveBeenCalled()
  })

  it('fetches and stores a url result', async () => {
    const outputPath = join(mkdtempSync(join(tmpdir(), 'framestretch-result-')), 'nested', 'out.mp4')
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response(new Uint8Array(VIDEO_BYTES), { status: 200 }))

    const saved = await saveResult({
      payload: { video_url: 'https://cdn.example.com/out.mp4' },
      outputPath,
      fetchImpl,
    })

    expect(saved).toEqual({ kind: 'reference', url: 'https://cdn.example.com/out.mp4' })
    expect(fetchImpl.mock.calls[0]?.[0]).toBe('https://cdn.example.com/out.mp4')
    expect(readFileSync(outputPath).equals(VIDEO_BYTES)).toBe(true)
  })

  it('fails when the download is rejected', async () => {
    const outputPath = join(mkdtempSync(join(tmpdir(), 'framestretch-result-')), 'out.mp4')
    const fetchImpl = vi.fn<typeof fetch>(
      async () => new Response('gone', { status: 410, statusText: 'Gone' })
    )

    await expect(
      saveResult({ payload: { video_url: 'https://cdn.example.com/out.mp4' }, outputPath, fetchImpl })
    ).rejects.toThrow(RemoteRequestError)
  })
})
