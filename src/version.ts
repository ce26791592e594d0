import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'

/** Reads the version from package.json one level above src/ or dist/. */
export function resolvePackageVersion(): string {
  try {
    const raw = readFileSync(fileURLToPath(new URL('../package.json', import.meta.url)), 'utf8')
    const parsed: unknown = JSON.parse(raw)
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed) {
      const version = parsed.version
      if (typeof version === 'string' && version.trim()) return version.trim()
    }
  } catch (error) {
    process.stderr.write(
      `framestretch: cannot read package version: ${error instanceof Error ? error.message : String(error)}\n`
    )
  }
  return '0.0.0'
}
