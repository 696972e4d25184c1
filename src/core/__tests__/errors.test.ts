/**
 * Error hierarchy tests
 */

import { describe, it, expect } from 'vitest'
import {
  AgentTimeoutError,
  AgentTransportError,
  ColloquyError,
  ConfigError,
  describeError,
  DocumentNotFoundError,
  InsufficientAgentsError,
  MissingCredentialError,
  ProblemSourceError,
  SchemaValidationError,
  StateTransitionError,
  ValidationMismatchError,
} from '../errors.js'

describe('ColloquyError', () => {
  it('carries a code and context', () => {
    const error = new ColloquyError('Something broke', 'SOMETHING', { runId: 'run-1' })
    expect(error).toBeInstanceOf(Error)
    expect(error.name).toBe('ColloquyError')
    expect(error.code).toBe('SOMETHING')
    expect(error.context).toEqual({ runId: 'run-1' })
  })

  it('serializes to JSON with its fields', () => {
    const json = new ConfigError('Bad value', { field: 'global.max_concurrency' }).toJSON()
    expect(json).toMatchObject({
      name: 'ConfigError',
      message: 'Bad value',
      code: 'CONFIG_ERROR',
      context: { field: 'global.max_concurrency' },
    })
  })
})

describe('subclasses', () => {
  it.each([
    [new ConfigError('x'), 'ConfigError', 'CONFIG_ERROR'],
    [new MissingCredentialError('TEST_KEY'), 'MissingCredentialError', 'MISSING_CREDENTIAL'],
    [new AgentTimeoutError('a', 5), 'AgentTimeoutError', 'AGENT_TIMEOUT'],
    [new SchemaValidationError('x'), 'SchemaValidationError', 'SCHEMA_VALIDATION'],
    [new AgentTransportError('x'), 'AgentTransportError', 'AGENT_TRANSPORT'],
    [new ValidationMismatchError('x'), 'ValidationMismatchError', 'VALIDATION_MISMATCH'],
    [new StateTransitionError('x'), 'StateTransitionError', 'STATE_TRANSITION'],
    [new InsufficientAgentsError(2, 3), 'InsufficientAgentsError', 'INSUFFICIENT_AGENTS'],
    [new DocumentNotFoundError('Runs', 'r1'), 'DocumentNotFoundError', 'DOCUMENT_NOT_FOUND'],
    [new ProblemSourceError('x'), 'ProblemSourceError', 'PROBLEM_SOURCE_ERROR'],
  ])('%s has name %s and code %s', (error, name, code) => {
    expect(error).toBeInstanceOf(ColloquyError)
    expect(error.name).toBe(name)
    expect(error.code).toBe(code)
  })

  it('builds messages from their arguments', () => {
    expect(new MissingCredentialError('TEST_KEY').message).toBe('Required credential is not set: TEST_KEY')
    expect(new AgentTimeoutError('agent-a', 30).message).toBe('Agent agent-a did not respond within 30s')
    expect(new InsufficientAgentsError(2, 3).message).toBe('At least 3 assessed agents required, got 2')
    expect(new DocumentNotFoundError('Runs', 'r1').message).toBe('Document not found: Runs/r1')
  })

  it('keeps structured context', () => {
    const error = new AgentTimeoutError('agent-a', 30, { problemId: 'p1' })
    expect(error.context).toEqual({ agentId: 'agent-a', timeoutSec: 30, problemId: 'p1' })
  })
})

describe('describeError', () => {
  it('uses the code of a ColloquyError', () => {
    expect(describeError(new StateTransitionError('nope'))).toEqual({ code: 'STATE_TRANSITION', message: 'nope' })
  })

  it('uses the name of a plain Error', () => {
    expect(describeError(new TypeError('bad type'))).toEqual({ code: 'TypeError', message: 'bad type' })
  })

  it('stringifies anything else', () => {
    expect(describeError('just a string')).toEqual({ code: 'UNKNOWN', message: 'just a string' })
  })
})
