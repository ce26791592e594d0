import type { ProgressEvent, ProgressSink } from '../progress/aggregator.js'
import { terminalColumns } from './terminal.js'

const BAR_WIDTH = 24
const PLAIN_STEP_PERCENT = 10

export function formatProgressLine(event: ProgressEvent, barWidth = BAR_WIDTH): string {
  const fraction = Math.min(1, Math.max(0, event.globalProgress))
  const filled = Math.round(fraction * barWidth)
  const bar = `${'#'.repeat(filled)}${'.'.repeat(barWidth - filled)}`
  const percent = String(Math.floor(fraction * 100)).padStart(3, ' ')
  return `[${bar}] ${percent}% ${event.label}`
}

/**
 * TTY: one line rewritten in place. Otherwise a plain line every 10% so logs and pipes
 * stay readable.
 */
export function createProgressBarRenderer({
  stream,
  rich,
}: {
  stream: NodeJS.WritableStream
  rich: boolean
}): { onProgress: ProgressSink; done: () => void } {
  let lastBucket = -1
  let drawn = false

  const onProgress: ProgressSink = (event) => {
    const line = formatProgressLine(event)
    if (rich) {
      const width = terminalColumns(stream) - 1
      stream.write(`\r\u001b[2K${line.slice(0, width)}`)
      drawn = true
      return
    }
    const bucket = Math.floor((event.globalProgress * 100) / PLAIN_STEP_PERCENT)
    if (bucket <= lastBucket) return
    lastBucket = bucket
    stream.write(`${line}\n`)
  }

  return {
    onProgress,
    done() {
      if (rich && drawn) stream.write('\n')
      drawn = false
    },
  }
}
