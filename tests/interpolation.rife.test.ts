import { EventEmitter } from 'node:events'
import { mkdirSync, mkdtempSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { PassThrough } from 'node:stream'
import { beforeEach, describe, expect, it, vi } from 'vitest'

const spawnMock = vi.hoisted(() => vi.fn())

vi.mock('node:child_process', () => ({ spawn: spawnMock }))

import {
  buildRifeArgs,
  createRifeInterpolator,
  listInterpolationModels,
} from '../src/interpolation/rife.js'

const mockRife = (lines: string[], code: number) => {
  spawnMock.mockImplementation(() => {
    const proc = Object.assign(new EventEmitter(), {
      stdout: new PassThrough(),
      stderr: new PassThrough(),
      kill: vi.fn(),
    })
    process.nextTick(() => {
      proc.stderr.end(lines.map((line) => `${line}\n`).join(''))
      proc.stdout.end()
      setImmediate(() => proc.emit('close', code, null))
    })
    return proc
  })
}

describe('rife arguments', () => {
  it('uses the defaults', () => {
    expect(buildRifeArgs({ inputDir: '/in', outputDir: '/out' })).toEqual([
      '-i',
      '/in',
      '-o',
      '/out',
      '-m',
      'rife-v4.6',
      '-g',
      '0',
      '-f',
      '%08d.png',
    ])
  })

  it('adds the UHD flag and GPU index', () => {
    const args = buildRifeArgs({ inputDir: '/in', outputDir: '/out', model: 'rife-v4', gpu: -1, uhd: true })
    expect(args.slice(4)).toEqual(['-m', 'rife-v4', '-g', '-1', '-f', '%08d.png', '-x'])
  })
})

describe('rife interpolator', () => {
  beforeEach(() => {
    spawnMock.mockReset()
  })

  it('runs in the models dir and reports slash counters', async () => {
    const root = mkdtempSync(join(tmpdir(), 'framestretch-rife-'))
    mockRife(['rife-v4.6 loaded', '1/4', '2/4', '2/4', '4/4'], 0)
    const updates: Array<[number, number]> = []

    const interpolator = createRifeInterpolator({ rifePath: '/opt/rife/rife-ncnn-vulkan', modelsDir: '/opt/rife' })
    const ok = await interpolator.runPass({
      inputDir: join(root, 'in'),
      outputDir: join(root, 'out'),
      onProgress: (current, total) => updates.push([current, total]),
    })

    expect(ok).toBe(true)
    expect(updates).toEqual([
      [1, 4],
      [2, 4],
      [4, 4],
    ])
    expect(spawnMock.mock.calls[0]?.[0]).toBe('/opt/rife/rife-ncnn-vulkan')
    expect(spawnMock.mock.calls[0]?.[2]).toMatchObject({ cwd: '/opt/rife' })
  })

  it('returns false on a non-zero exit', async () => {
    const root = mkdtempSync(join(tmpdir(), 'framestretch-rife-'))
    mockRife(['vkCreateInstance failed'], 255)
    const interpolator = createRifeInterpolator({ rifePath: 'rife', modelsDir: root })
    await expect(
      interpolator.runPass({ inputDir: join(root, 'in'), outputDir: join(root, 'out') })
    ).resolves.toBe(false)
  })
})

describe('model listing', () => {
  it('lists rife model directories in order', async () => {
    const root = mkdtempSync(join(tmpdir(), 'framestretch-models-'))
    for (const name of ['rife-v4.6', 'rife-anime', 'models-other', 'rife-v2.3']) {
      mkdirSync(join(root, name))
    }
    await expect(listInterpolationModels(root)).resolves.toEqual([
      'rife-anime',
      'rife-v2.3',
      'rife-v4.6',
    ])
  })

  it('returns nothing for a missing directory', async () => {
    await expect(listInterpolationModels('/nonexistent/models')).resolves.toEqual([])
  })
})
