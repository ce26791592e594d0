import { Command, Option } from 'commander'

import { MULTIPLIER_CHOICES } from '../flags.js'

export type SlomoFlags = {
  multiplier?: string
  model?: string
  gpu?: string
  uhd: boolean
  fps?: string
  quality?: string
}

export type ContinueFlags = {
  prompt?: string
  negativePrompt?: string
  duration: string
  steps?: string
  guidance?: string
  concatenate: boolean
  apiKey?: string
  endpointId?: string
  timeout?: string
}

export type InfoFlags = {
  multiplier?: string
}

export type CliCommand =
  | { kind: 'slomo'; input: string; output: string | null; flags: SlomoFlags }
  | { kind: 'continue'; input: string; output: string | null; flags: ContinueFlags }
  | { kind: 'info'; input: string; flags: InfoFlags }
  | { kind: 'models' }

/**
 * Parsing only: actions hand the selected command back through `onCommand` and the
 * caller runs it. Output settings and the exit override are applied before the
 * subcommands are added so they inherit them.
 */
export function buildProgram({
  version,
  stdout,
  stderr,
  onCommand,
}: {
  version: string
  stdout: NodeJS.WritableStream
  stderr: NodeJS.WritableStream
  onCommand: (command: CliCommand) => void
}): Command {
  const program = new Command()
    .name('framestretch')
    .description('Slow-motion interpolation and AI video continuation for local video files.')
    .version(version, '-V, --version', 'Print version and exit')
    .option('--verbose', 'Print debug logs to stderr', false)
    .configureOutput({
      writeOut(str) {
        stdout.write(str)
      },
      writeErr(str) {
        stderr.write(str)
      },
    })
    .exitOverride()

  program
    .command('slomo')
    .description('Create a slow-motion video by frame interpolation (rife-ncnn-vulkan).')
    .argument('<input>', 'Input video (.mp4, .avi, .mov, .mkv, .webm)')
    .argument('[output]', 'Output path (default: <input>_slomo<N>x.mp4)')
    .addOption(
      new Option('-m, --multiplier <n>', 'Frame multiplier (default: 4)').choices(MULTIPLIER_CHOICES)
    )
    .option('--model <name>', 'Interpolation model (default: rife-v4.6)')
    .option('--gpu <index>', 'GPU device index, -1 for CPU (default: 0)')
    .option('--uhd', 'UHD mode for 4K input', false)
    .option('--fps <rate>', 'Output frame rate (default: input frame rate)')
    .option('--quality <crf>', 'x264 CRF, lower is better (default: 18)')
    .action((input: string, output: string | undefined, flags: SlomoFlags) => {
      onCommand({ kind: 'slomo', input, output: output ?? null, flags })
    })

  program
    .command('continue')
    .description('Generate a continuation of a video from its last frame on a RunPod endpoint.')
    .argument('<input>', 'Input video (.mp4, .avi, .mov, .mkv, .webm)')
    .argument(
      '[output]',
      'Output path (default: <input>_extended.mp4, or <input>_continued.mp4 with --no-concatenate)'
    )
    .option('-p, --prompt <text>', 'What should happen next (optional)')
    .option('--negative-prompt <text>', 'What to avoid')
    .option('-d, --duration <seconds>', 'Seconds to generate, 1-6', '6')
    .option('--steps <count>', 'Inference steps (default: 50)')
    .option('--guidance <scale>', 'Guidance scale (default: 6.0)')
    .option('--no-concatenate', 'Write only the continuation, not original + continuation')
    .option('--api-key <key>', 'RunPod API key (default: RUNPOD_API_KEY or config)')
    .option('--endpoint-id <id>', 'RunPod endpoint id (default: RUNPOD_ENDPOINT_ID or config)')
    .option('--timeout <duration>', 'Remote job timeout: 300, 300s, 5m (default: 300s)')
    .action((input: string, output: string | undefined, flags: ContinueFlags) => {
      onCommand({ kind: 'continue', input, output: output ?? null, flags })
    })

  program
    .command('info')
    .description('Print video metadata, optionally with a slow-motion preview.')
    .argument('<input>', 'Input video')
    .addOption(
      new Option('-m, --multiplier <n>', 'Preview output for this multiplier').choices(
        MULTIPLIER_CHOICES
      )
    )
    .action((input: string, flags: InfoFlags) => {
      onCommand({ kind: 'info', input, flags })
    })

  program
    .command('models')
    .description('List installed interpolation models.')
    .action(() => {
      onCommand({ kind: 'models' })
    })

  return program
}
