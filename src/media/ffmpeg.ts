import { promises as fs } from 'node:fs'
import path from 'node:path'

import { ProcessFailureError } from '../errors.js'
import type { AppLogger } from '../logging/logger.js'
import { createCounterProgressHandler, parseKeyedCounter } from '../progress/parse.js'
import { assertProcessSucceeded, runProcess } from '../process/run-process.js'
import { probeMedia } from './probe.js'
import type { FrameCallback, MediaToolkit } from './types.js'

export const FRAME_PATTERN = '%08d.png'
const DEFAULT_REENCODE_CRF = 18

export async function countFrameFiles(dir: string): Promise<number> {
  const entries = await fs.readdir(dir).catch(() => [])
  return entries.filter((entry) => entry.toLowerCase().endsWith('.png')).length
}

/** ffmpeg concat demuxer line; single quotes are closed, escaped and reopened. */
export function formatConcatEntry(filePath: string): string {
  const escaped = path.resolve(filePath).replace(/'/g, "'\\''")
  return `file '${escaped}'`
}

export function buildExtractFramesArgs(input: string, outputDir: string): string[] {
  return ['-i', input, '-vsync', '0', '-q:v', '2', path.join(outputDir, FRAME_PATTERN)]
}

export function buildReassembleArgs({
  framesDir,
  output,
  fps,
  quality,
}: {
  framesDir: string
  output: string
  fps: number
  quality: number
}): string[] {
  return [
    '-y',
    '-framerate',
    String(fps),
    '-i',
    path.join(framesDir, FRAME_PATTERN),
    '-c:v',
    'libx264',
    '-preset',
    'medium',
    '-crf',
    String(quality),
    '-pix_fmt',
    'yuv420p',
    output,
  ]
}

export function buildReencodeArgs({
  input,
  output,
  fps,
  width,
  height,
}: {
  input: string
  output: string
  fps?: number | null
  width?: number | null
  height?: number | null
}): string[] {
  const args = [
    '-y',
    '-i',
    input,
    '-c:v',
    'libx264',
    '-preset',
    'medium',
    '-crf',
    String(DEFAULT_REENCODE_CRF),
    '-pix_fmt',
    'yuv420p',
  ]
  if (typeof fps === 'number' && fps > 0) args.push('-r', String(fps))
  if (typeof width === 'number' && width > 0 && typeof height === 'number' && height > 0) {
    args.push('-vf', `scale=${width}:${height}`)
  }
  args.push(output)
  return args
}

function frameHandler(onFrame: FrameCallback | undefined, totalFrames: number) {
  if (!onFrame) return null
  return createCounterProgressHandler({
    parse: (line) => parseKeyedCounter(line, 'frame'),
    fallbackTotal: totalFrames,
    onProgress: ({ current, total }) => onFrame(current, total),
  })
}

export function createFfmpegToolkit({
  ffmpegPath,
  ffprobePath,
  logger,
}: {
  ffmpegPath: string
  ffprobePath: string
  logger?: AppLogger | null
}): MediaToolkit {
  const ffmpeg = async (args: string[], onLine?: ((line: string) => void) | null) => {
    logger?.debug('ffmpeg', { args })
    const startedAt = Date.now()
    const result = await runProcess({ command: ffmpegPath, args, label: 'ffmpeg', onLine })
    logger?.debug('ffmpeg finished', { code: result.code, elapsedMs: Date.now() - startedAt })
    assertProcessSucceeded(result, 'ffmpeg')
  }

  return {
    probe: (inputPath) => probeMedia({ ffprobePath, inputPath, logger }),

    async extractFrames({ input, outputDir, totalFrames, onFrame }) {
      await fs.mkdir(outputDir, { recursive: true })
      await ffmpeg(buildExtractFramesArgs(input, outputDir), frameHandler(onFrame, totalFrames))
      return countFrameFiles(outputDir)
    },

    async reassembleFrames({ framesDir, output, fps, quality, onFrame }) {
      const totalFrames = await countFrameFiles(framesDir)
      await fs.mkdir(path.dirname(output), { recursive: true })
      await ffmpeg(
        buildReassembleArgs({ framesDir, output, fps, quality }),
        frameHandler(onFrame, totalFrames)
      )
    },

    async extractLastFrame({ input, output }) {
      await fs.mkdir(path.dirname(output), { recursive: true })
      // -sseof -1: seek to one second before the end, keep the first decoded frame.
      await ffmpeg(['-y', '-sseof', '-1', '-i', input, '-vframes', '1', '-q:v', '2', output])
      const stat = await fs.stat(output).catch(() => null)
      if (!stat?.isFile()) {
        throw new ProcessFailureError('ffmpeg', 0, `no frame written to ${output}`)
      }
    },

    async reencode(args) {
      await fs.mkdir(path.dirname(args.output), { recursive: true })
      await ffmpeg(buildReencodeArgs(args))
    },

    async concat({ first, second, output, listFile }) {
      await fs.mkdir(path.dirname(output), { recursive: true })
      await fs.writeFile(
        listFile,
        `${formatConcatEntry(first)}\n${formatConcatEntry(second)}\n`,
        'utf8'
      )
      try {
        await ffmpeg(['-y', '-f', 'concat', '-safe', '0', '-i', listFile, '-c', 'copy', output])
      } finally {
        await fs.rm(listFile, { force: true })
      }
    },
  }
}
