/**
 * Keeps provider credentials out of logs and CLI output.
 *
 * Two layers: pino redaction paths for structured log fields, and string
 * scrubbing for anything rendered to the terminal. Scrubbing replaces the
 * exact key values the run resolved first, then anything shaped like a
 * provider key.
 */

/** Placeholder shown instead of a real credential */
export const MASKED_VALUE = '***'

/** Environment variables the bundled providers read their keys from */
export const PROVIDER_KEY_ENV_VARS = ['OPENAI_API_KEY', 'GOOGLE_API_KEY', 'DEEPSEEK_API_KEY'] as const

interface KeyShape {
  provider: string
  pattern: RegExp
}

const KEY_SHAPES: readonly KeyShape[] = [
  { provider: 'openai-compatible', pattern: /sk-[A-Za-z0-9_-]{20,}/g },
  { provider: 'google', pattern: /AIza[A-Za-z0-9_-]{35,}/g },
  { provider: 'hex-token', pattern: /\b[A-Fa-f0-9]{40}\b/g },
]

/** Resolved values shorter than this are too generic to scrub verbatim */
const MIN_KNOWN_SECRET_LENGTH = 8

/** Pass to `pino({ redact })` */
export const PINO_REDACT_PATHS: string[] = [
  'apiKey',
  'api_key',
  '*.apiKey',
  '*.api_key',
  ...PROVIDER_KEY_ENV_VARS.map((name) => `env.${name}`),
]

/** Object keys whose values are never displayed */
const CREDENTIAL_FIELDS: ReadonlySet<string> = new Set([
  'api_key',
  'apiKey',
  'api_key_value',
  'token',
  'secret',
  'password',
])

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * Scrub `input` of the given key values and of provider-shaped keys.
 * Unknown secret formats pass through unchanged.
 */
export function maskSecrets(input: string, knownSecrets: readonly string[] = []): string {
  const literal = knownSecrets
    .filter((secret) => secret.length >= MIN_KNOWN_SECRET_LENGTH)
    .sort((a, b) => b.length - a.length)
    .reduce((text, secret) => text.replace(new RegExp(escapeRegExp(secret), 'g'), MASKED_VALUE), input)

  return KEY_SHAPES.reduce((text, { pattern }) => {
    pattern.lastIndex = 0
    return text.replace(pattern, MASKED_VALUE)
  }, literal)
}

/**
 * Copy a plain value tree with credential fields replaced and string leaves scrubbed.
 */
export function deepMask(value: unknown, knownSecrets: readonly string[] = []): unknown {
  if (typeof value === 'string') return maskSecrets(value, knownSecrets)
  if (Array.isArray(value)) return value.map((item) => deepMask(item, knownSecrets))
  if (value === null || typeof value !== 'object') return value

  return Object.fromEntries(
    Object.entries(value).map(([key, child]) => [
      key,
      CREDENTIAL_FIELDS.has(key) ? MASKED_VALUE : deepMask(child, knownSecrets),
    ]),
  )
}

/**
 * The key values a set of providers would read from `env`, for literal scrubbing.
 */
export function providerSecrets(
  providers: Record<string, { api_key_env: string }>,
  env: NodeJS.ProcessEnv,
): string[] {
  const values = Object.values(providers)
    .map((provider) => env[provider.api_key_env])
    .filter((value): value is string => value !== undefined && value !== '')
  return [...new Set(values)]
}
