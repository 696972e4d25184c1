/**
 * JSON extraction and validation for structured agent output.
 *
 * Providers that honour a JSON-schema response format return bare JSON, but
 * some wrap it in a ```json fence or surround it with prose. Extraction:
 * 1. Take the LAST fenced block (```json ... ``` or ``` ... ```) if present
 * 2. Otherwise take the span from the first `{` to the last `}`
 * 3. Parse with JSON.parse and validate with the Zod schema
 */

import type { ZodType } from 'zod'
import { SchemaValidationError } from '../../core/errors.js'

/**
 * Extract the JSON payload from raw model output.
 *
 * @returns The raw JSON string, or null if the output holds no object
 */
export function extractJsonPayload(output: string): string | null {
  if (!output || output.trim() === '') {
    return null
  }

  const fencePattern = /```(?:json)?\s*\n([\s\S]*?)```/g
  let lastFenced: string | null = null
  let match: RegExpExecArray | null
  while ((match = fencePattern.exec(output)) !== null) {
    const content = match[1]
    if (content !== undefined && content.trim() !== '') {
      lastFenced = content.trim()
    }
  }
  if (lastFenced !== null) {
    return lastFenced
  }

  const start = output.indexOf('{')
  const end = output.lastIndexOf('}')
  if (start === -1 || end <= start) {
    return null
  }
  return output.slice(start, end + 1)
}

/**
 * Parse raw model output and validate it against `schema`.
 *
 * @throws {SchemaValidationError} when no JSON is found, it does not parse, or it fails validation
 */
export function parseStructuredOutput<T>(
  output: string,
  schema: ZodType<T>,
  context: Record<string, unknown> = {},
): T {
  const payload = extractJsonPayload(output)
  if (payload === null) {
    throw new SchemaValidationError('Agent output contains no JSON object', context)
  }

  let raw: unknown
  try {
    raw = JSON.parse(payload)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new SchemaValidationError(`Agent output is not valid JSON: ${message}`, context)
  }

  const result = schema.safeParse(raw)
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`)
    throw new SchemaValidationError(`Agent output failed schema validation: ${issues.join('; ')}`, {
      ...context,
      issues,
    })
  }
  return result.data
}
