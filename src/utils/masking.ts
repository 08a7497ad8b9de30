/**
 * Credential masking utilities for CLI output and pino logger redaction.
 *
 * Keeps provider credentials out of logs, stored generation errors and
 * status output.
 */

/** Placeholder shown instead of a real credential */
export const MASKED_VALUE = '***'

/**
 * Regex patterns that identify API key values inside free text.
 */
export const API_KEY_PATTERNS: RegExp[] = [
  // Anthropic: sk-ant-...
  /sk-ant-[A-Za-z0-9_-]{20,}/g,
  // OpenAI: sk-...
  /sk-[A-Za-z0-9_-]{20,}/g,
  // Google: AIza...
  /AIza[A-Za-z0-9_-]{35,}/g,
  // Generic 40-char hex tokens
  /\b[A-Fa-f0-9]{40}\b/g,
]

/**
 * Known pino redaction paths for credential fields.
 * Pass this array to the `pino({ redact: ... })` option.
 */
export const PINO_REDACT_PATHS: string[] = [
  'apiKey',
  'api_key',
  '*.apiKey',
  '*.api_key',
  'env.ANTHROPIC_API_KEY',
]

/**
 * Replace any known API key patterns in a string with `***`.
 *
 * Best-effort scrub for error strings; it does NOT guarantee removal of every
 * possible secret format.
 */
export function maskSecrets(input: string): string {
  let result = input
  for (const pattern of API_KEY_PATTERNS) {
    // Reset lastIndex in case the regex is reused (global flag)
    pattern.lastIndex = 0
    result = result.replace(pattern, MASKED_VALUE)
  }
  return result
}

/**
 * Credential field names that should be replaced with `***` in displayed output.
 */
const CREDENTIAL_FIELDS = new Set(['api_key', 'apiKey', 'token', 'secret', 'password'])

/**
 * Deep-clone a plain-object tree and replace known credential fields with `***`.
 * Primitives are returned as-is.
 */
export function deepMask(value: unknown): unknown {
  if (value === null || value === undefined) return value
  if (Array.isArray(value)) return value.map(deepMask)
  if (typeof value === 'object') {
    const masked: Record<string, unknown> = {}
    for (const [k, v] of Object.entries(value)) {
      masked[k] = CREDENTIAL_FIELDS.has(k) ? MASKED_VALUE : deepMask(v)
    }
    return masked
  }
  return value
}
