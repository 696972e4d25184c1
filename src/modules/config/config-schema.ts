/**
 * Zod validation schemas for the Colloquy configuration system.
 *
 * Defines schemas for all config sections:
 *  - global settings
 *  - per-stage timeouts
 *  - problem dataset selection
 *  - provider endpoints and agent roster
 *  - full config document
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Global settings
// ---------------------------------------------------------------------------

/** Longest delay a Node timer honours, in whole seconds */
export const MAX_TIMER_SEC = Math.floor((2 ** 31 - 1) / 1000)

const TimerSecondsSchema = z.number().positive().max(MAX_TIMER_SEC)

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

export const GlobalSettingsSchema = z
  .object({
    log_level: LogLevelSchema,
    /** Max simultaneous agent calls within one session */
    max_concurrency: z.number().int().min(1).max(64),
    /** Max sessions the batch runner keeps in flight */
    max_concurrent_sessions: z.number().int().min(1).max(16),
    /** Seconds between "still waiting" log lines of an agent call */
    log_interval_sec: TimerSecondsSchema,
    /** Root of the mirrored per-document JSON audit files */
    output_dir: z.string().min(1),
    database_path: z.string().min(1),
    mirror_artifacts: z.boolean(),
  })
  .strict()

export type GlobalSettings = z.infer<typeof GlobalSettingsSchema>

// ---------------------------------------------------------------------------
// Stage timeouts
// ---------------------------------------------------------------------------

export const TimeoutsSchema = z
  .object({
    role_assessment_sec: TimerSecondsSchema,
    solve_sec: TimerSecondsSchema,
    peer_review_sec: TimerSecondsSchema,
    refine_sec: TimerSecondsSchema,
  })
  .strict()

export type TimeoutsConfig = z.infer<typeof TimeoutsSchema>

// ---------------------------------------------------------------------------
// Problem selection
// ---------------------------------------------------------------------------

export const ProblemsSettingsSchema = z
  .object({
    path: z.string().min(1),
    skip: z.number().int().min(0),
    take: z.number().int().min(1).optional(),
  })
  .strict()

export type ProblemsSettings = z.infer<typeof ProblemsSettingsSchema>

// ---------------------------------------------------------------------------
// Providers and agents
// ---------------------------------------------------------------------------

/** OpenAI-compatible endpoint shared by one or more agents */
export const ProviderConfigSchema = z
  .object({
    /** Endpoint root; omitted for api.openai.com */
    base_url: z.string().url().optional(),
    /** Name of the environment variable that holds the API key */
    api_key_env: z.string().min(1),
  })
  .strict()

export type ProviderConfig = z.infer<typeof ProviderConfigSchema>

export const AgentEntrySchema = z
  .object({
    llm_id: z.string().min(1),
    provider: z.string().min(1),
    model: z.string().min(1),
    temperature: z.number().min(0).max(2),
    top_p: z.number().gt(0).max(1),
  })
  .strict()

export type AgentEntry = z.infer<typeof AgentEntrySchema>

// ---------------------------------------------------------------------------
// Top-level configuration document
// ---------------------------------------------------------------------------

/** Current supported config format version */
export const CURRENT_CONFIG_FORMAT_VERSION = '1'

export const ColloquyConfigSchema = z
  .object({
    config_format_version: z.literal(CURRENT_CONFIG_FORMAT_VERSION),
    global: GlobalSettingsSchema,
    timeouts: TimeoutsSchema,
    problems: ProblemsSettingsSchema,
    providers: z.record(z.string(), ProviderConfigSchema),
    agents: z.array(AgentEntrySchema),
  })
  .strict()
  .superRefine((config, ctx) => {
    const seen = new Set<string>()
    config.agents.forEach((agent, index) => {
      if (seen.has(agent.llm_id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['agents', index, 'llm_id'],
          message: `Duplicate llm_id "${agent.llm_id}"`,
        })
      }
      seen.add(agent.llm_id)
      if (config.providers[agent.provider] === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['agents', index, 'provider'],
          message: `Unknown provider "${agent.provider}"`,
        })
      }
    })
  })

export type ColloquyConfig = z.infer<typeof ColloquyConfigSchema>

// ---------------------------------------------------------------------------
// Partial config (allowed per source before merging)
// ---------------------------------------------------------------------------

export const PartialColloquyConfigSchema = z
  .object({
    config_format_version: z.literal(CURRENT_CONFIG_FORMAT_VERSION).optional(),
    global: GlobalSettingsSchema.partial().optional(),
    timeouts: TimeoutsSchema.partial().optional(),
    problems: ProblemsSettingsSchema.partial().optional(),
    providers: z.record(z.string(), ProviderConfigSchema.partial()).optional(),
    /** Replaces the agent roster as a whole */
    agents: z.array(AgentEntrySchema).optional(),
  })
  .strict()

export type PartialColloquyConfig = z.infer<typeof PartialColloquyConfigSchema>
