export type FailureKind =
  | 'missing-tool'
  | 'process-failure'
  | 'parse-failure'
  | 'media-not-found'
  | 'no-video-stream'
  | 'authentication'
  | 'endpoint-not-found'
  | 'remote-request'
  | 'job-failed'
  | 'job-timeout'
  | 'unknown-response-format'
  | 'cancelled'
  | 'invalid-input'

export class FramestretchError extends Error {
  readonly kind: FailureKind

  constructor(kind: FailureKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.kind = kind
    this.name = new.target.name
  }
}

export class MissingExternalToolError extends FramestretchError {
  readonly tools: string[]

  constructor(tools: string[], hint?: string) {
    const suffix = hint ? ` (${hint})` : ''
    super('missing-tool', `Missing ${tools.join(', ')}${suffix}.`)
    this.tools = tools
  }
}

export class ProcessFailureError extends FramestretchError {
  readonly tool: string
  readonly exitCode: number | null

  constructor(tool: string, exitCode: number | null, detail?: string) {
    const suffix = detail?.trim() ? `: ${detail.trim()}` : ''
    super(
      'process-failure',
      exitCode === null ? `${tool} failed${suffix}` : `${tool} exited with code ${exitCode}${suffix}`
    )
    this.tool = tool
    this.exitCode = exitCode
  }
}

export class ParseFailureError extends FramestretchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('parse-failure', message, options)
  }
}

export class MediaNotFoundError extends FramestretchError {
  readonly path: string

  constructor(path: string) {
    super('media-not-found', `Input file not found: ${path}`)
    this.path = path
  }
}

export class NoVideoStreamError extends FramestretchError {
  constructor(path: string) {
    super('no-video-stream', `No video stream found in ${path}`)
  }
}

export class AuthenticationError extends FramestretchError {
  constructor(message = 'RunPod rejected the API key') {
    super('authentication', message)
  }
}

export class EndpointNotFoundError extends FramestretchError {
  readonly endpointId: string

  constructor(endpointId: string) {
    super('endpoint-not-found', `RunPod endpoint not found: ${endpointId}`)
    this.endpointId = endpointId
  }
}

export class RemoteRequestError extends FramestretchError {
  readonly status: number

  constructor(status: number, message: string) {
    super('remote-request', message)
    this.status = status
  }
}

export class JobFailedError extends FramestretchError {
  readonly reason: string

  constructor(reason: string) {
    super('job-failed', `Job failed: ${reason}`)
    this.reason = reason
  }
}

export class JobTimeoutError extends FramestretchError {
  readonly timeoutSeconds: number

  constructor(timeoutSeconds: number) {
    super('job-timeout', `Job timed out after ${timeoutSeconds} seconds`)
    this.timeoutSeconds = timeoutSeconds
  }
}

export class UnknownResponseFormatError extends FramestretchError {
  constructor(detail: string) {
    super('unknown-response-format', `Unknown response format: ${detail}`)
  }
}

export class UserCancelledError extends FramestretchError {
  constructor() {
    super('cancelled', 'Cancelled by user')
  }
}

export class InvalidInputError extends FramestretchError {
  constructor(message: string) {
    super('invalid-input', message)
  }
}

export function isFramestretchError(error: unknown): error is FramestretchError {
  return error instanceof FramestretchError
}

export function failureKindOf(error: unknown): FailureKind {
  return isFramestretchError(error) ? error.kind : 'process-failure'
}

/**
 * Operator-facing one-liner. The prefix separates configuration problems
 * (tools, credentials, input) from remote and processing failures.
 */
export function describeFailure(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error)
  switch (failureKindOf(error)) {
    case 'missing-tool':
      return `Missing tool: ${message}`
    case 'authentication':
    case 'endpoint-not-found':
      return `Bad credentials: ${message}`
    case 'job-failed':
    case 'unknown-response-format':
    case 'remote-request':
      return `Remote job failed: ${message}`
    case 'job-timeout':
      return `Remote job timed out: ${message}`
    case 'cancelled':
      return 'Cancelled by user'
    case 'invalid-input':
    case 'media-not-found':
    case 'no-video-stream':
      return `Invalid input: ${message}`
    default:
      return `Processing failed: ${message}`
  }
}
