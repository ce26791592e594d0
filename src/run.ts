import path from 'node:path'

import { CommanderError } from 'commander'

import {
  type FramestretchConfig,
  loadFramestretchConfig,
  resolveRunpodCredentials,
} from './config.js'
import { AuthenticationError } from './errors.js'
import {
  parseContinuationSecondsArg,
  parseFpsArg,
  parseGpuArg,
  parseGuidanceArg,
  parseMultiplierArg,
  parseQualityArg,
  parseStepsArg,
  parseTimeoutSecondsArg,
} from './flags.js'
import {
  createRifeInterpolator,
  DEFAULT_RIFE_MODEL,
  type FrameInterpolator,
  listInterpolationModels,
  type RifeOptions,
} from './interpolation/rife.js'
import { countPasses } from './interpolation/scheduler.js'
import { type AppLogging, createAppLogging } from './logging/logger.js'
import { createFfmpegToolkit } from './media/ffmpeg.js'
import { formatResolution, type MediaInfo, type MediaToolkit } from './media/types.js'
import { runContinuationPipeline } from './pipeline/continuation.js'
import { type PipelineHandle, launchPipeline } from './pipeline/launch.js'
import { DEFAULT_MULTIPLIER, runSlowMotionPipeline } from './pipeline/slowmo.js'
import { createRunpodClient, type RemoteJobClient } from './remote/runpod.js'
import { type CliCommand, type ContinueFlags, type SlomoFlags, buildProgram } from './run/help.js'
import { requireTools, resolveRifeModelsDir } from './run/env.js'
import { createProgressBarRenderer } from './run/progress-bar.js'
import { isRichTty } from './run/terminal.js'
import { resolveScratchRoot } from './temp/scratch.js'
import { resolvePackageVersion } from './version.js'

export type CliDeps = {
  requireTools?: typeof requireTools
  createToolkit?: (args: Parameters<typeof createFfmpegToolkit>[0]) => MediaToolkit
  createInterpolator?: (options: RifeOptions) => FrameInterpolator
  createClient?: (args: Parameters<typeof createRunpodClient>[0]) => RemoteJobClient
  listModels?: (modelsDir: string) => Promise<string[]>
}

export type RunEnv = {
  env: Record<string, string | undefined>
  fetch: typeof fetch
  stdout: NodeJS.WritableStream
  stderr: NodeJS.WritableStream
  /** Registers a handler for the user's interrupt; returns the unsubscribe. */
  onInterrupt?: ((handler: () => void) => () => void) | null
  deps?: CliDeps
}

export const EXIT_FAILURE = 1
export const EXIT_CANCELLED = 130

type CommandContext = {
  env: Record<string, string | undefined>
  fetch: typeof fetch
  stdout: NodeJS.WritableStream
  stderr: NodeJS.WritableStream
  onInterrupt: ((handler: () => void) => () => void) | null
  deps: Required<CliDeps>
  config: FramestretchConfig | null
  logging: AppLogging
}

function formatSeconds(seconds: number): string {
  return `${seconds.toFixed(2)} s`
}

export function formatMediaInfo(filePath: string, info: MediaInfo): string[] {
  return [
    `File: ${filePath}`,
    `Resolution: ${formatResolution(info)}`,
    `Frame rate: ${info.fps.toFixed(2)} fps`,
    `Duration: ${formatSeconds(info.duration)}`,
    `Frames: ${info.frameCount}`,
    `Codec: ${info.codec}`,
  ]
}

/** Output estimate for `multiplier`, played back at the input frame rate. */
export function formatSlowMotionPreview(info: MediaInfo, multiplier: number): string {
  const factor = 2 ** countPasses(multiplier)
  const frames = info.frameCount * factor
  const seconds = info.fps > 0 ? frames / info.fps : 0
  return `Slow motion ${factor}x: ${frames} frames, ${formatSeconds(seconds)} at ${info.fps.toFixed(2)} fps`
}

async function awaitPipeline(handle: PipelineHandle, ctx: CommandContext): Promise<number> {
  const unsubscribe = ctx.onInterrupt?.(() => {
    if (handle.cancelRequested) return
    ctx.stderr.write('\nCancelling after the current step...\n')
    handle.cancel()
  })
  try {
    const result = await handle.result
    if (result.success) {
      ctx.stderr.write(
        `Done in ${result.elapsedSeconds.toFixed(1)}s: ${formatResolution(result.output)}, ${result.output.frameCount} frames, ${formatSeconds(result.output.duration)}\n`
      )
      ctx.stdout.write(`${result.outputPath}\n`)
      return 0
    }
    ctx.stderr.write(`${result.errorMessage}\n`)
    return result.errorKind === 'cancelled' ? EXIT_CANCELLED : EXIT_FAILURE
  } finally {
    unsubscribe?.()
  }
}

function createRenderer(ctx: CommandContext) {
  return createProgressBarRenderer({ stream: ctx.stderr, rich: isRichTty(ctx.stderr, ctx.env) })
}

async function runSlomoCommand(
  input: string,
  output: string | null,
  flags: SlomoFlags,
  ctx: CommandContext
): Promise<number> {
  const { config, env, logging } = ctx
  const multiplier = flags.multiplier
    ? parseMultiplierArg(flags.multiplier)
    : (config?.slowmo?.multiplier ?? DEFAULT_MULTIPLIER)
  const gpu = flags.gpu ? parseGpuArg(flags.gpu) : config?.slowmo?.gpu
  const fps = flags.fps ? parseFpsArg(flags.fps) : null
  const quality = flags.quality ? parseQualityArg(flags.quality) : config?.slowmo?.quality

  const tools = ctx.deps.requireTools(['ffmpeg', 'ffprobe', 'rife'], env, config)
  const toolkit = ctx.deps.createToolkit({
    ffmpegPath: tools.path('ffmpeg'),
    ffprobePath: tools.path('ffprobe'),
    logger: logging.getSubLogger('probe'),
  })
  const rifePath = tools.path('rife')
  const interpolator = ctx.deps.createInterpolator({
    rifePath,
    modelsDir: resolveRifeModelsDir(rifePath, config),
    model: flags.model?.trim() || config?.slowmo?.model || DEFAULT_RIFE_MODEL,
    gpu,
    uhd: flags.uhd,
    logger: logging.getSubLogger('rife'),
  })

  const renderer = createRenderer(ctx)
  const handle = launchPipeline((signal) =>
    runSlowMotionPipeline(
      {
        inputPath: path.resolve(input),
        outputPath: output ? path.resolve(output) : null,
        multiplier,
        fps,
        quality,
      },
      { toolkit, interpolator },
      {
        tempRoot: resolveScratchRoot({ env, configured: config?.tempDir }),
        signal,
        onProgress: renderer.onProgress,
        logger: logging.getSubLogger('pipeline'),
      }
    )
  )
  try {
    return await awaitPipeline(handle, ctx)
  } finally {
    renderer.done()
  }
}

async function runContinueCommand(
  input: string,
  output: string | null,
  flags: ContinueFlags,
  ctx: CommandContext
): Promise<number> {
  const { config, env, logging } = ctx
  const durationSeconds = parseContinuationSecondsArg(flags.duration)
  const steps = flags.steps ? parseStepsArg(flags.steps) : null
  const guidanceScale = flags.guidance ? parseGuidanceArg(flags.guidance) : null
  const timeoutSeconds = flags.timeout
    ? parseTimeoutSecondsArg(flags.timeout)
    : config?.runpod?.timeoutSeconds

  const credentials = resolveRunpodCredentials({
    explicit: { apiKey: flags.apiKey, endpointId: flags.endpointId },
    env,
    config,
  })
  if (!credentials.apiKey) {
    throw new AuthenticationError(
      'Missing RunPod API key (set RUNPOD_API_KEY, runpod.apiKey or --api-key)'
    )
  }
  if (!credentials.endpointId) {
    throw new AuthenticationError(
      'Missing RunPod endpoint id (set RUNPOD_ENDPOINT_ID, runpod.endpointId or --endpoint-id)'
    )
  }

  const tools = ctx.deps.requireTools(['ffmpeg', 'ffprobe'], env, config)
  const toolkit = ctx.deps.createToolkit({
    ffmpegPath: tools.path('ffmpeg'),
    ffprobePath: tools.path('ffprobe'),
    logger: logging.getSubLogger('probe'),
  })
  const client = ctx.deps.createClient({
    apiKey: credentials.apiKey,
    endpointId: credentials.endpointId,
    baseUrl: config?.runpod?.baseUrl,
    fetchImpl: ctx.fetch,
    logger: logging.getSubLogger('remote'),
  })

  const renderer = createRenderer(ctx)
  const handle = launchPipeline((signal) =>
    runContinuationPipeline(
      {
        inputPath: path.resolve(input),
        outputPath: output ? path.resolve(output) : null,
        prompt: flags.prompt,
        negativePrompt: flags.negativePrompt,
        durationSeconds,
        steps,
        guidanceScale,
        concatenate: flags.concatenate,
      },
      {
        toolkit,
        client,
        fetchImpl: ctx.fetch,
        timing: {
          timeoutSeconds,
          pollIntervalSeconds: config?.runpod?.pollIntervalSeconds,
        },
      },
      {
        tempRoot: resolveScratchRoot({ env, configured: config?.tempDir }),
        signal,
        onProgress: renderer.onProgress,
        logger: logging.getSubLogger('pipeline'),
      }
    )
  )
  try {
    return await awaitPipeline(handle, ctx)
  } finally {
    renderer.done()
  }
}

async function runInfoCommand(
  input: string,
  multiplierRaw: string | undefined,
  ctx: CommandContext
): Promise<number> {
  const multiplier = multiplierRaw ? parseMultiplierArg(multiplierRaw) : null
  const tools = ctx.deps.requireTools(['ffprobe'], ctx.env, ctx.config)
  const toolkit = ctx.deps.createToolkit({
    ffmpegPath: 'ffmpeg',
    ffprobePath: tools.path('ffprobe'),
    logger: ctx.logging.getSubLogger('probe'),
  })
  const inputPath = path.resolve(input)
  const info = await toolkit.probe(inputPath)
  const lines = formatMediaInfo(inputPath, info)
  if (multiplier !== null) lines.push(formatSlowMotionPreview(info, multiplier))
  ctx.stdout.write(`${lines.join('\n')}\n`)
  return 0
}

async function runModelsCommand(ctx: CommandContext): Promise<number> {
  const tools = ctx.deps.requireTools(['rife'], ctx.env, ctx.config)
  const modelsDir = resolveRifeModelsDir(tools.path('rife'), ctx.config)
  const models = await ctx.deps.listModels(modelsDir)
  if (models.length === 0) {
    ctx.stderr.write(`No interpolation models found in ${modelsDir}\n`)
    return EXIT_FAILURE
  }
  ctx.stdout.write(`${models.join('\n')}\n`)
  return 0
}

/**
 * Parses `argv` (without node and script), runs the chosen command and resolves with the
 * process exit code. Setup failures (missing tools, credentials, bad flags) are thrown;
 * pipeline failures are reported on stderr and mapped to an exit code.
 */
export async function runCli(
  argv: string[],
  { env, fetch, stdout, stderr, onInterrupt = null, deps = {} }: RunEnv
): Promise<number> {
  const normalizedArgv = argv.filter((arg) => arg !== '--')
  const selection: { command: CliCommand | null } = { command: null }
  const program = buildProgram({
    version: resolvePackageVersion(),
    stdout,
    stderr,
    onCommand: (command) => {
      selection.command = command
    },
  })

  try {
    program.parse(normalizedArgv, { from: 'user' })
  } catch (error) {
    if (error instanceof CommanderError) {
      if (error.code === 'commander.helpDisplayed' || error.code === 'commander.version') return 0
      return error.exitCode === 0 ? EXIT_FAILURE : error.exitCode
    }
    throw error
  }

  const command = selection.command
  if (!command) {
    program.outputHelp()
    return EXIT_FAILURE
  }

  const verbose = program.opts().verbose === true
  const { config } = loadFramestretchConfig({ env })
  const logging = createAppLogging({ env, config, verbose, stderr })
  const ctx: CommandContext = {
    env,
    fetch,
    stdout,
    stderr,
    onInterrupt,
    config,
    logging,
    deps: {
      requireTools: deps.requireTools ?? requireTools,
      createToolkit: deps.createToolkit ?? createFfmpegToolkit,
      createInterpolator: deps.createInterpolator ?? createRifeInterpolator,
      createClient: deps.createClient ?? createRunpodClient,
      listModels: deps.listModels ?? listInterpolationModels,
    },
  }

  try {
    switch (command.kind) {
      case 'slomo':
        return await runSlomoCommand(command.input, command.output, command.flags, ctx)
      case 'continue':
        return await runContinueCommand(command.input, command.output, command.flags, ctx)
      case 'info':
        return await runInfoCommand(command.input, command.flags.multiplier, ctx)
      case 'models':
        return await runModelsCommand(ctx)
    }
  } finally {
    await logging.flush()
  }
}
