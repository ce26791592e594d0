export function isRichTty(
  stream: NodeJS.WritableStream,
  env: Record<string, string | undefined> = {}
): boolean {
  if (env.TERM === 'dumb' || env.CI) return false
  return 'isTTY' in stream && stream.isTTY === true
}

export function terminalColumns(stream: NodeJS.WritableStream): number {
  if ('columns' in stream && typeof stream.columns === 'number' && stream.columns > 0) {
    return stream.columns
  }
  return 80
}
