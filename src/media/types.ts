export type MediaInfo = {
  readonly width: number
  readonly height: number
  readonly fps: number
  readonly duration: number
  /** Reported by the probe when available, otherwise round(fps * duration). */
  readonly frameCount: number
  readonly codec: string
}

export type FrameCallback = ((current: number, total: number) => void) | null

export type MediaToolkit = {
  probe: (inputPath: string) => Promise<MediaInfo>
  extractFrames: (args: {
    input: string
    outputDir: string
    totalFrames: number
    onFrame?: FrameCallback
  }) => Promise<number>
  reassembleFrames: (args: {
    framesDir: string
    output: string
    fps: number
    quality: number
    onFrame?: FrameCallback
  }) => Promise<void>
  extractLastFrame: (args: { input: string; output: string }) => Promise<void>
  reencode: (args: {
    input: string
    output: string
    fps?: number | null
    width?: number | null
    height?: number | null
  }) => Promise<void>
  concat: (args: {
    first: string
    second: string
    output: string
    listFile: string
  }) => Promise<void>
}

export const SUPPORTED_VIDEO_EXTENSIONS = ['.mp4', '.avi', '.mov', '.mkv', '.webm'] as const

export function formatResolution(info: Pick<MediaInfo, 'width' | 'height'>): string {
  return `${info.width}x${info.height}`
}
