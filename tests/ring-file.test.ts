import { existsSync, mkdtempSync, readFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, expect, it } from 'vitest'

import { createRingFileWriter } from '../src/logging/ring-file.js'

const line = (label: string) => label.padEnd(29, '.')

describe('ring file writer', () => {
  it('rotates when size exceeds max bytes', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'framestretch-ring-'))
    const filePath = join(dir, 'framestretch.jsonl')
    const writer = createRingFileWriter({ filePath, maxBytes: 40, maxFiles: 2 })

    writer.write('first-line-1234567890')
    writer.write('second-line-1234567890')
    await writer.flush()

    expect(readFileSync(filePath, 'utf8')).toBe('second-line-1234567890\n')
    expect(readFileSync(`${filePath}.1`, 'utf8')).toBe('first-line-1234567890\n')
  })

  it('drops the oldest generation', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'framestretch-ring-'))
    const filePath = join(dir, 'logs', 'framestretch.jsonl')
    const writer = createRingFileWriter({ filePath, maxBytes: 40, maxFiles: 3 })

    for (const label of ['one', 'two', 'three', 'four']) writer.write(line(label))
    await writer.flush()

    expect(readFileSync(filePath, 'utf8')).toBe(`${line('four')}\n`)
    expect(readFileSync(`${filePath}.1`, 'utf8')).toBe(`${line('three')}\n`)
    expect(readFileSync(`${filePath}.2`, 'utf8')).toBe(`${line('two')}\n`)
    expect(existsSync(`${filePath}.3`)).toBe(false)
  })

  it('truncates in place with a single file', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'framestretch-ring-'))
    const filePath = join(dir, 'framestretch.jsonl')
    const writer = createRingFileWriter({ filePath, maxBytes: 40, maxFiles: 1 })

    writer.write(line('one'))
    writer.write(line('two'))
    await writer.flush()

    expect(readFileSync(filePath, 'utf8')).toBe(`${line('two')}\n`)
    expect(existsSync(`${filePath}.1`)).toBe(false)
  })
})
