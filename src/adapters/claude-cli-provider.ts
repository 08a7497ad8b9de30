/**
 * Claude CLI provider
 *
 * Implements GenerationProvider on top of the Claude Code command-line tool.
 * Binary: `claude` (or `providers.claude-cli.cli_path`)
 * Invocation: `claude -p --output-format json --system-prompt <frame> [--model <m>]`
 * with the request document on stdin.
 */

import { execFile, spawn } from 'node:child_process'
import { promisify } from 'node:util'
import { CapabilityError } from '../core/errors.js'
import type { CapabilityFailureReason } from '../core/errors.js'
import { maskSecrets } from '../utils/masking.js'
import { createLogger } from '../utils/logger.js'
import type { GenerationProvider } from './generation-provider.js'
import { ClaudeCliEnvelopeSchema, VariantEnvelopeSchema, stripCodeFences } from './schemas.js'
import type {
  ProviderCallOptions,
  ProviderHealthResult,
  ProviderRequest,
  ProviderResult,
} from './types.js'

const execFileAsync = promisify(execFile)

const logger = createLogger('claude-cli-provider')

/** Most stderr characters carried into an error message */
const MAX_ERROR_TEXT = 500

/**
 * Replaces the interactive session's system prompt so the child process
 * answers the request document and nothing else.
 */
const SYSTEM_PROMPT =
  'You generate structured story content. ' +
  'The user message is a JSON request document. ' +
  'Produce exactly the number of variants it asks for, each following "output.shape". ' +
  'Treat earlier entries in "context.instructions" as stronger constraints. ' +
  'Reply with raw JSON of the form {"variants": [...]} and nothing else.'

// ---------------------------------------------------------------------------
// Failure classification
// ---------------------------------------------------------------------------

const RATE_LIMIT_PATTERN = /rate.?limit|too many requests|\b429\b|overloaded/i
const POLICY_PATTERN = /usage policy|content policy|cannot help with|refus/i

/**
 * Turn CLI failure text into a CapabilityError.
 * Rate limits are transient, policy refusals permanent, anything else transient.
 */
export function classifyCliFailure(text: string): CapabilityError {
  const message = maskSecrets(text.trim()).slice(0, MAX_ERROR_TEXT) || 'Claude CLI failed without output'
  let reason: CapabilityFailureReason = 'unavailable'
  let transient = true
  if (RATE_LIMIT_PATTERN.test(text)) {
    reason = 'rate_limit'
  } else if (POLICY_PATTERN.test(text)) {
    reason = 'policy_rejection'
    transient = false
  }
  return new CapabilityError(message, reason, transient, { provider: 'claude-cli' })
}

// ---------------------------------------------------------------------------
// ClaudeCliProvider
// ---------------------------------------------------------------------------

export interface ClaudeCliProviderOptions {
  /** Path or name of the binary; defaults to `claude` on PATH */
  cliPath?: string
  /** Model passed through `--model`; the CLI default otherwise */
  model?: string
}

/**
 * Provider backed by the Claude CLI in print mode.
 *
 * A missing binary and policy refusals are permanent failures; rate limits,
 * non-zero exits and unparseable output are transient.
 */
export class ClaudeCliProvider implements GenerationProvider {
  readonly id = 'claude-cli'
  readonly displayName = 'Claude CLI'

  private readonly _binary: string
  private readonly _model: string | undefined

  constructor(options: ClaudeCliProviderOptions = {}) {
    this._binary = options.cliPath ?? 'claude'
    this._model = options.model
  }

  /**
   * Verify the binary is installed by running `<binary> --version`.
   */
  async healthCheck(): Promise<ProviderHealthResult> {
    try {
      const { stdout } = await execFileAsync(this._binary, ['--version'], { timeout: 10_000 })
      return { healthy: true, version: stdout.trim() }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      return { healthy: false, error: `Claude CLI not available: ${message}` }
    }
  }

  /** Arguments for one print-mode invocation */
  buildArgs(): string[] {
    const args = ['-p', '--output-format', 'json', '--system-prompt', SYSTEM_PROMPT]
    if (this._model !== undefined) {
      args.push('--model', this._model)
    }
    return args
  }

  generate(request: ProviderRequest, options: ProviderCallOptions): Promise<ProviderResult> {
    if (options.signal.aborted) {
      return Promise.reject(
        new CapabilityError('Claude CLI call aborted before start', 'timeout', true, {
          generationId: request.generationId,
        }),
      )
    }

    // Nested invocations would otherwise inherit the parent session's settings
    const env: NodeJS.ProcessEnv = { ...process.env }
    delete env['CLAUDECODE']
    delete env['CLAUDE_CODE_ENTRYPOINT']

    return new Promise<ProviderResult>((resolve, reject) => {
      const proc = spawn(this._binary, this.buildArgs(), { env, stdio: ['pipe', 'pipe', 'pipe'] })
      const stdoutChunks: Buffer[] = []
      const stderrChunks: Buffer[] = []
      let settled = false

      const settle = (fn: () => void): void => {
        if (settled) return
        settled = true
        options.signal.removeEventListener('abort', onAbort)
        fn()
      }

      const onAbort = (): void => {
        proc.kill('SIGTERM')
        settle(() => {
          reject(
            new CapabilityError(
              `Claude CLI did not answer within ${String(options.timeoutMs)}ms`,
              'timeout',
              true,
              { generationId: request.generationId },
            ),
          )
        })
      }
      options.signal.addEventListener('abort', onAbort, { once: true })

      proc.on('error', (err: NodeJS.ErrnoException) => {
        settle(() => {
          if (err.code === 'ENOENT') {
            reject(
              new CapabilityError(`Claude CLI binary "${this._binary}" not found`, 'unavailable', false, {
                provider: this.id,
              }),
            )
          } else {
            reject(new CapabilityError(err.message, 'unavailable', true, { provider: this.id }))
          }
        })
      })

      proc.stdout?.on('data', (chunk: Buffer) => {
        stdoutChunks.push(chunk)
      })
      proc.stderr?.on('data', (chunk: Buffer) => {
        stderrChunks.push(chunk)
      })

      proc.on('close', (exitCode: number | null) => {
        settle(() => {
          const stdout = Buffer.concat(stdoutChunks).toString('utf-8')
          const stderr = Buffer.concat(stderrChunks).toString('utf-8')
          try {
            resolve(this.parseOutput(stdout, stderr, exitCode ?? 1))
          } catch (err) {
            reject(err)
          }
        })
      })

      if (proc.stdin !== null) {
        proc.stdin.on('error', (err: NodeJS.ErrnoException) => {
          // EPIPE means the process exited before reading; the close handler reports it
          if (err.code !== 'EPIPE') {
            logger.warn({ generationId: request.generationId, error: err.message }, 'stdin write error')
          }
        })
        proc.stdin.end(request.body)
      }

      logger.debug(
        { generationId: request.generationId, taskKind: request.taskKind, variants: request.variants },
        'Claude CLI invoked',
      )
    })
  }

  /**
   * Parse CLI stdout into a ProviderResult.
   *
   * @throws {CapabilityError} for a failed exit, an error envelope or output
   *   that is not a `{ variants: [...] }` document
   */
  parseOutput(stdout: string, stderr: string, exitCode: number): ProviderResult {
    if (exitCode !== 0) {
      throw classifyCliFailure(stderr || stdout || `Process exited with code ${String(exitCode)}`)
    }

    const envelope = ClaudeCliEnvelopeSchema.safeParse(parseJson(stdout))
    if (!envelope.success) {
      throw new CapabilityError('Claude CLI printed an unexpected envelope', 'malformed_output', true, {
        provider: this.id,
      })
    }
    const { is_error: isError, result, usage } = envelope.data
    if (isError === true) {
      throw classifyCliFailure(result ?? 'Claude CLI reported an error')
    }
    if (result === undefined || result.trim() === '') {
      throw new CapabilityError('Claude CLI returned an empty result', 'malformed_output', true, {
        provider: this.id,
      })
    }

    const payload = VariantEnvelopeSchema.safeParse(parseJson(stripCodeFences(result)))
    if (!payload.success) {
      throw new CapabilityError('Model output is not a {"variants": [...]} document', 'malformed_output', true, {
        provider: this.id,
        output: result.slice(0, MAX_ERROR_TEXT),
      })
    }

    return {
      variants: payload.data.variants,
      ...(this._model !== undefined ? { model: this._model } : {}),
      ...(usage !== undefined
        ? { tokensUsed: { input: usage.input_tokens ?? 0, output: usage.output_tokens ?? 0 } }
        : {}),
    }
  }
}

/** JSON.parse that yields undefined instead of throwing */
function parseJson(text: string): unknown {
  try {
    return JSON.parse(text.trim())
  } catch {
    return undefined
  }
}
