import { Writable } from 'node:stream'
import { describe, expect, it } from 'vitest'

import { createProgressBarRenderer, formatProgressLine } from '../src/run/progress-bar.js'
import { isRichTty } from '../src/run/terminal.js'

const collect = () => {
  const chunks: string[] = []
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString('utf8'))
      callback()
    },
  })
  return { stream, chunks }
}

describe('progress bar', () => {
  it('formats a fixed-width bar', () => {
    expect(formatProgressLine({ label: 'Extracting frames...', globalProgress: 0.5 }, 10)).toBe(
      '[#####.....]  50% Extracting frames...'
    )
    expect(formatProgressLine({ label: 'Complete!', globalProgress: 1 }, 4)).toBe('[####] 100% Complete!')
  })

  it('prints one plain line per 10% step', () => {
    const { stream, chunks } = collect()
    const renderer = createProgressBarRenderer({ stream, rich: false })
    for (const globalProgress of [0, 0.02, 0.05, 0.12, 0.15, 0.31, 1]) {
      renderer.onProgress({ label: 'Working', globalProgress })
    }
    renderer.done()
    expect(chunks.map((chunk) => chunk.slice(27))).toEqual([
      '  0% Working\n',
      ' 12% Working\n',
      ' 31% Working\n',
      '100% Working\n',
    ])
  })

  it('rewrites a single line on a tty', () => {
    const { stream, chunks } = collect()
    const renderer = createProgressBarRenderer({ stream, rich: true })
    renderer.onProgress({ label: 'Working', globalProgress: 0.5 })
    renderer.done()
    expect(chunks).toEqual([
      '\r\u001b[2K[############............]  50% Working',
      '\n',
    ])
  })

  it('never treats dumb terminals or CI as rich', () => {
    const tty = Object.assign(collect().stream, { isTTY: true })
    expect(isRichTty(tty, {})).toBe(true)
    expect(isRichTty(tty, { TERM: 'dumb' })).toBe(false)
    expect(isRichTty(tty, { CI: 'true' })).toBe(false)
    expect(isRichTty(collect().stream, {})).toBe(false)
  })
})
