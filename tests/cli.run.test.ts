import { mkdtempSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { Writable } from 'node:stream'
import { describe, expect, it, vi } from 'vitest'

import { AuthenticationError } from '../src/errors.js'
import type { FrameInterpolator } from '../src/interpolation/rife.js'
import type { MediaInfo, MediaToolkit } from '../src/media/types.js'
import type { RemoteJobClient } from '../src/remote/runpod.js'
import { type CliDeps, runCli } from '../src/run.js'
import type { ToolName } from '../src/run/env.js'

type ExtractArgs = Parameters<MediaToolkit['extractFrames']>[0]
type WriteArgs = { output: string }

const INFO: MediaInfo = {
  width: 1920,
  height: 1080,
  fps: 29.97,
  duration: 10.01,
  frameCount: 300,
  codec: 'h264',
}

const collectStream = () => {
  let text = ''
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      text += chunk.toString('utf8')
      callback()
    },
  })
  return { stream, read: () => text }
}

const fakeTools: CliDeps['requireTools'] = () => ({
  path: (tool: ToolName) => (tool === 'rife' ? '/opt/rife/rife-ncnn-vulkan' : `/usr/bin/${tool}`),
})

const fakeToolkit = (overrides: Partial<MediaToolkit> = {}): MediaToolkit => ({
  probe: vi.fn(async () => INFO),
  extractFrames: vi.fn(async ({ totalFrames, onFrame }: ExtractArgs) => {
    onFrame?.(totalFrames, totalFrames)
    return totalFrames
  }),
  reassembleFrames: vi.fn(async () => {}),
  extractLastFrame: vi.fn(async ({ output }: WriteArgs) => {
    writeFileSync(output, 'frame')
  }),
  reencode: vi.fn(async ({ output }: WriteArgs) => {
    writeFileSync(output, 'matched')
  }),
  concat: vi.fn(async () => {}),
  ...overrides,
})

const fakeInterpolator = (ok = true): FrameInterpolator => ({ runPass: vi.fn(async () => ok) })

const setup = (deps: CliDeps = {}, onInterrupt: ((handler: () => void) => () => void) | null = null) => {
  const root = mkdtempSync(join(tmpdir(), 'framestretch-cli-'))
  const stdout = collectStream()
  const stderr = collectStream()
  const run = (argv: string[]) =>
    runCli(argv, {
      env: { FRAMESTRETCH_TEMP_DIR: join(root, 'scratch') },
      fetch: vi.fn<typeof fetch>(),
      stdout: stdout.stream,
      stderr: stderr.stream,
      onInterrupt,
      deps: { requireTools: fakeTools, ...deps },
    })
  return { root, run, stdout: stdout.read, stderr: stderr.read }
}

describe('cli', () => {
  it('prints the package version', async () => {
    const { run, stdout } = setup()
    await expect(run(['--version'])).resolves.toBe(0)
    expect(stdout()).toBe('0.1.0\n')
  })

  it('prints media info with a slow motion preview', async () => {
    const toolkit = fakeToolkit()
    const { run, stdout } = setup({ createToolkit: () => toolkit })

    await expect(run(['info', '/videos/clip.mp4', '-m', '8'])).resolves.toBe(0)

    expect(stdout()).toBe(
      [
        'File: /videos/clip.mp4',
        'Resolution: 1920x1080',
        'Frame rate: 29.97 fps',
        'Duration: 10.01 s',
        'Frames: 300',
        'Codec: h264',
        'Slow motion 8x: 2400 frames, 80.08 s at 29.97 fps',
        '',
      ].join('\n')
    )
    expect(toolkit.probe).toHaveBeenCalledWith('/videos/clip.mp4')
  })

  it('lists models next to the rife binary', async () => {
    const listModels = vi.fn(async () => ['rife-v4', 'rife-v4.6'])
    const { run, stdout } = setup({ listModels })
    await expect(run(['models'])).resolves.toBe(0)
    expect(stdout()).toBe('rife-v4\nrife-v4.6\n')
    expect(listModels).toHaveBeenCalledWith('/opt/rife')
  })

  it('fails when no models are installed', async () => {
    const { run, stderr } = setup({ listModels: async () => [] })
    await expect(run(['models'])).resolves.toBe(1)
    expect(stderr()).toBe('No interpolation models found in /opt/rife\n')
  })

  it('rejects multipliers outside the choices', async () => {
    const { run, stderr } = setup()
    await expect(run(['slomo', '/videos/clip.mp4', '-m', '3'])).resolves.toBe(1)
    expect(stderr()).toContain('Allowed choices are 2, 4, 8, 16.')
  })

  it('runs slow motion and prints the output path', async () => {
    const createInterpolator = vi.fn(() => fakeInterpolator())
    const { root, run, stdout, stderr } = setup({
      createToolkit: () => fakeToolkit(),
      createInterpolator,
    })
    const outputPath = join(root, 'slow.mp4')

    await expect(run(['slomo', '/videos/clip.mp4', outputPath, '-m', '2', '--uhd'])).resolves.toBe(0)

    expect(stdout()).toBe(`${outputPath}\n`)
    expect(stderr()).toContain('100% Complete!')
    expect(createInterpolator).toHaveBeenCalledWith(
      expect.objectContaining({ modelsDir: '/opt/rife', model: 'rife-v4.6', uhd: true })
    )
  })

  it('maps a failed pipeline to exit code 1', async () => {
    const { root, run, stdout, stderr } = setup({
      createToolkit: () => fakeToolkit(),
      createInterpolator: () => fakeInterpolator(false),
    })

    await expect(run(['slomo', '/videos/clip.mp4', join(root, 'slow.mp4')])).resolves.toBe(1)

    expect(stdout()).toBe('')
    expect(stderr()).toContain('Processing failed: rife-ncnn-vulkan failed: frame interpolation failed\n')
  })

  it('cancels on interrupt and exits with 130', async () => {
    const handlers: Array<() => void> = []
    const unsubscribe = vi.fn()
    const toolkit = fakeToolkit({
      extractFrames: vi.fn(async ({ totalFrames, onFrame }: ExtractArgs) => {
        for (const handler of handlers) handler()
        onFrame?.(1, totalFrames)
        return totalFrames
      }),
    })
    const { root, run, stderr } = setup(
      { createToolkit: () => toolkit, createInterpolator: () => fakeInterpolator() },
      (handler) => {
        handlers.push(handler)
        return unsubscribe
      }
    )

    await expect(run(['slomo', '/videos/clip.mp4', join(root, 'slow.mp4')])).resolves.toBe(130)

    expect(stderr()).toContain('\nCancelling after the current step...\n')
    expect(stderr()).toContain('Cancelled by user\n')
    expect(unsubscribe).toHaveBeenCalledTimes(1)
  })

  it('requires RunPod credentials before starting a continuation', async () => {
    const { run } = setup({ createToolkit: () => fakeToolkit() })
    await expect(run(['continue', '/videos/clip.mp4'])).rejects.toThrow(AuthenticationError)
    await expect(run(['continue', '/videos/clip.mp4', '-p', 'waves', '--api-key', 'test-key'])).rejects.toThrow(
      'Missing RunPod endpoint id'
    )
  })

  it('runs a continuation with explicit credentials', async () => {
    const client: RemoteJobClient = {
      submit: vi.fn(async () => ({ id: 'job-1', status: 'IN_QUEUE' as const })),
      status: vi.fn(async () => ({
        status: 'COMPLETED' as const,
        output: { video: Buffer.from('generated').toString('base64') },
        error: null,
      })),
      cancel: vi.fn(async () => {}),
    }
    const createClient = vi.fn(() => client)
    const toolkit = fakeToolkit()
    const { root, run, stdout } = setup({ createToolkit: () => toolkit, createClient })
    const outputPath = join(root, 'continued.mp4')

    await expect(
      run([
        'continue',
        '/videos/clip.mp4',
        outputPath,
        '-p',
        'waves',
        '-d',
        '2',
        '--api-key',
        'test-key',
        '--endpoint-id',
        'ep-1',
      ])
    ).resolves.toBe(0)

    expect(stdout()).toBe(`${outputPath}\n`)
    expect(createClient).toHaveBeenCalledWith(
      expect.objectContaining({ apiKey: 'test-key', endpointId: 'ep-1' })
    )
    expect(client.submit).toHaveBeenCalledWith(expect.objectContaining({ prompt: 'waves', num_frames: 17 }))
    expect(toolkit.concat).toHaveBeenCalledTimes(1)
  })
})
