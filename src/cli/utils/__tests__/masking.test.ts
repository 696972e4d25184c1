/**
 * Unit tests for credential masking.
 */

import { describe, it, expect } from 'vitest'
import { deepMask, maskSecrets, MASKED_VALUE, PINO_REDACT_PATHS, providerSecrets } from '../masking.js'

describe('maskSecrets', () => {
  it('masks an sk- key', () => {
    expect(maskSecrets('sk-test-secret-placeholder-value')).toBe(MASKED_VALUE)
  })

  it('masks an AIza key inside a longer message', () => {
    const key = `AIza${'x'.repeat(35)}`
    expect(maskSecrets(`request failed for key ${key} (403)`)).toBe('request failed for key *** (403)')
  })

  it('masks a 40-character hex token', () => {
    expect(maskSecrets(`token=${'ab12'.repeat(10)}`)).toBe('token=***')
  })

  it('returns input unchanged when no secrets present', () => {
    expect(maskSecrets('no secrets here')).toBe('no secrets here')
  })

  it('leaves short sk- strings alone', () => {
    expect(maskSecrets('sk-short')).toBe('sk-short')
  })

  it('masks known secret values verbatim, longest first', () => {
    expect(maskSecrets('keys test-secret and test-secret-long', ['test-secret', 'test-secret-long'])).toBe(
      'keys *** and ***',
    )
  })

  it('treats regex characters in a known secret literally', () => {
    expect(maskSecrets('key=a.b+c*d?e and aXbbc', ['a.b+c*d?e'])).toBe('key=*** and aXbbc')
  })

  it('ignores known secrets too short to scrub', () => {
    expect(maskSecrets('id abc in text', ['abc'])).toBe('id abc in text')
  })
})

describe('providerSecrets', () => {
  it('collects distinct non-empty key values', () => {
    expect(
      providerSecrets(
        {
          openai: { api_key_env: 'OPENAI_API_KEY' },
          mirror: { api_key_env: 'OPENAI_API_KEY' },
          google: { api_key_env: 'GOOGLE_API_KEY' },
          local: { api_key_env: 'LOCAL_KEY' },
        },
        { OPENAI_API_KEY: 'test-secret', GOOGLE_API_KEY: '' },
      ),
    ).toEqual(['test-secret'])
  })
})

describe('PINO_REDACT_PATHS', () => {
  it('covers the bundled provider key variables', () => {
    expect(PINO_REDACT_PATHS).toEqual(
      expect.arrayContaining(['apiKey', '*.api_key', 'env.OPENAI_API_KEY', 'env.DEEPSEEK_API_KEY']),
    )
  })
})

describe('deepMask', () => {
  it('replaces credential fields and scrubs strings at any depth', () => {
    expect(
      deepMask({
        providers: {
          proxy: { api_key: 'test-secret', api_key_env: 'PROXY_KEY' },
        },
        notes: ['uses sk-test-secret-placeholder-value', 'plain'],
        retries: 0,
        base: null,
      }),
    ).toEqual({
      providers: { proxy: { api_key: MASKED_VALUE, api_key_env: 'PROXY_KEY' } },
      notes: ['uses ***', 'plain'],
      retries: 0,
      base: null,
    })
  })

  it('scrubs known secrets from string leaves', () => {
    expect(deepMask({ error: 'denied for test-secret-value' }, ['test-secret-value'])).toEqual({
      error: 'denied for ***',
    })
  })
})
