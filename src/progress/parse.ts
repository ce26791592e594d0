export type ProgressCounter = {
  current: number
  total: number | null
}

export type ProgressLineParser = (line: string) => ProgressCounter | null

const KEYED_COUNTER = /\b([a-z_]+)=\s*(\d+)\b/gi
const SLASH_COUNTER = /(\d+)\/(\d+)/

/** `frame=  123` style token (ffmpeg status line). The total is never on the line. */
export function parseKeyedCounter(line: string, key = 'frame'): ProgressCounter | null {
  const wanted = key.toLowerCase()
  for (const match of line.matchAll(KEYED_COUNTER)) {
    if (match[1]?.toLowerCase() !== wanted) continue
    const current = Number.parseInt(match[2] ?? '', 10)
    if (Number.isFinite(current) && current >= 0) return { current, total: null }
  }
  return null
}

/** `12/345` pair (rife-ncnn-vulkan). */
export function parseSlashCounter(line: string): ProgressCounter | null {
  const match = SLASH_COUNTER.exec(line)
  if (!match) return null
  const current = Number.parseInt(match[1] ?? '', 10)
  const total = Number.parseInt(match[2] ?? '', 10)
  if (!Number.isFinite(current) || !Number.isFinite(total) || total <= 0) return null
  return { current, total }
}

export function parseProgressLine(line: string): ProgressCounter | null {
  return parseKeyedCounter(line) ?? parseSlashCounter(line)
}

export type CounterUpdate = { current: number; total: number }

/**
 * Line handler for `runProcess`. Fills a missing total from `fallbackTotal`, drops lines
 * without a usable counter and repeats of the last reported value.
 */
export function createCounterProgressHandler({
  parse = parseProgressLine,
  fallbackTotal,
  onProgress,
}: {
  parse?: ProgressLineParser
  fallbackTotal?: number | null
  onProgress: (update: CounterUpdate) => void
}): (line: string) => void {
  let lastCurrent = -1
  let lastTotal = -1
  return (line) => {
    const parsed = parse(line)
    if (!parsed) return
    const total = parsed.total ?? fallbackTotal ?? null
    if (total == null || total <= 0) return
    if (parsed.current === lastCurrent && total === lastTotal) return
    lastCurrent = parsed.current
    lastTotal = total
    onProgress({ current: parsed.current, total })
  }
}

export function counterFraction({ current, total }: CounterUpdate): number {
  if (!Number.isFinite(current) || !Number.isFinite(total) || total <= 0) return 0
  return Math.max(0, Math.min(1, current / total))
}
