import { accessSync, constants, statSync } from 'node:fs'
import path from 'node:path'

import type { FramestretchConfig } from '../config.js'
import { MissingExternalToolError } from '../errors.js'

export type ToolName = 'ffmpeg' | 'ffprobe' | 'rife'

const TOOL_BINARIES: Record<ToolName, string> = {
  ffmpeg: 'ffmpeg',
  ffprobe: 'ffprobe',
  rife: 'rife-ncnn-vulkan',
}

const TOOL_ENV_KEYS: Record<ToolName, string> = {
  ffmpeg: 'FFMPEG_PATH',
  ffprobe: 'FFPROBE_PATH',
  rife: 'RIFE_PATH',
}

const INSTALL_HINTS: Record<ToolName, string> = {
  ffmpeg: 'install ffmpeg or set FFMPEG_PATH',
  ffprobe: 'install ffmpeg or set FFPROBE_PATH',
  rife: 'download rife-ncnn-vulkan and set RIFE_PATH or tools.rife',
}

function isExecutableFile(candidate: string, platform: NodeJS.Platform): boolean {
  try {
    if (!statSync(candidate).isFile()) return false
    if (platform !== 'win32') accessSync(candidate, constants.X_OK)
    return true
  } catch {
    return false
  }
}

export function resolveExecutableInPath(
  binary: string,
  env: Record<string, string | undefined>,
  platform: NodeJS.Platform = process.platform
): string | null {
  const trimmed = binary.trim()
  if (!trimmed) return null
  const extensions =
    platform === 'win32'
      ? ['', ...(env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';').filter(Boolean)]
      : ['']

  if (trimmed.includes('/') || trimmed.includes('\\')) {
    for (const ext of extensions) {
      const candidate = path.resolve(`${trimmed}${ext}`)
      if (isExecutableFile(candidate, platform)) return candidate
    }
    return null
  }

  const pathValue = env.PATH ?? env.Path ?? ''
  const separator = platform === 'win32' ? ';' : ':'
  for (const dir of pathValue.split(separator)) {
    if (!dir) continue
    for (const ext of extensions) {
      const candidate = path.join(dir, `${trimmed}${ext}`)
      if (isExecutableFile(candidate, platform)) return candidate
    }
  }
  return null
}

/** config path > `<TOOL>_PATH` env > lookup on PATH. */
export function resolveToolPath(
  tool: ToolName,
  env: Record<string, string | undefined>,
  config: FramestretchConfig | null
): string | null {
  const configured = config?.tools?.[tool]?.trim()
  if (configured) return resolveExecutableInPath(configured, env)
  const explicit = env[TOOL_ENV_KEYS[tool]]?.trim()
  if (explicit) return resolveExecutableInPath(explicit, env)
  return resolveExecutableInPath(TOOL_BINARIES[tool], env)
}

export type ResolvedTools<T extends ToolName> = {
  path: (tool: T) => string
}

/**
 * Resolves every tool and fails fast, before any work starts, when a required one is
 * missing. All missing tools are reported together.
 */
export function requireTools<T extends ToolName>(
  required: readonly T[],
  env: Record<string, string | undefined>,
  config: FramestretchConfig | null
): ResolvedTools<T> {
  const resolved = new Map<T, string>()
  const missing: T[] = []
  for (const tool of required) {
    const found = resolveToolPath(tool, env, config)
    if (found) resolved.set(tool, found)
    else missing.push(tool)
  }
  if (missing.length > 0) {
    const hints = missing.map((tool) => INSTALL_HINTS[tool]).join('; ')
    throw new MissingExternalToolError(
      missing.map((tool) => TOOL_BINARIES[tool]),
      hints
    )
  }
  return {
    path(tool) {
      const found = resolved.get(tool)
      if (!found) throw new MissingExternalToolError([TOOL_BINARIES[tool]], INSTALL_HINTS[tool])
      return found
    },
  }
}

export function resolveRifeModelsDir(
  rifePath: string,
  config: FramestretchConfig | null
): string {
  const configured = config?.tools?.rifeModelsDir?.trim()
  return configured ? path.resolve(configured) : path.dirname(rifePath)
}
