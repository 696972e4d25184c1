/**
 * Built-in default values for the Colloquy configuration system.
 *
 * These are the lowest-priority defaults; they are overridden by:
 *   global config → project config → environment variables → CLI flags
 */

import type {
  ColloquyConfig,
  GlobalSettings,
  TimeoutsConfig,
  ProviderConfig,
  AgentEntry,
} from './config-schema.js'
import { CURRENT_CONFIG_FORMAT_VERSION } from './config-schema.js'

// ---------------------------------------------------------------------------
// Providers
// ---------------------------------------------------------------------------

export const DEFAULT_GEMINI_PROVIDER: ProviderConfig = {
  base_url: 'https://generativelanguage.googleapis.com/v1beta/openai/',
  api_key_env: 'GOOGLE_API_KEY',
}

export const DEFAULT_OPENAI_PROVIDER: ProviderConfig = {
  api_key_env: 'OPENAI_API_KEY',
}

export const DEFAULT_DEEPSEEK_PROVIDER: ProviderConfig = {
  base_url: 'https://api.deepseek.com',
  api_key_env: 'DEEPSEEK_API_KEY',
}

// ---------------------------------------------------------------------------
// Agent roster: two model sizes, each at a low and a high temperature
// ---------------------------------------------------------------------------

export const DEFAULT_AGENTS: AgentEntry[] = [
  { llm_id: 'gemini-3-pro-1', provider: 'gemini', model: 'gemini-3-pro-preview', temperature: 0.6, top_p: 0.9 },
  { llm_id: 'gemini-3-flash-1', provider: 'gemini', model: 'gemini-3-flash-preview', temperature: 0.3, top_p: 0.95 },
  { llm_id: 'gemini-3-pro', provider: 'gemini', model: 'gemini-3-pro-preview', temperature: 0.3, top_p: 0.9 },
  { llm_id: 'gemini-3-flash', provider: 'gemini', model: 'gemini-3-flash-preview', temperature: 0.8, top_p: 0.95 },
]

// ---------------------------------------------------------------------------
// Global settings and timeouts
// ---------------------------------------------------------------------------

export const DEFAULT_GLOBAL_SETTINGS: GlobalSettings = {
  log_level: 'warn',
  max_concurrency: 5,
  max_concurrent_sessions: 1,
  log_interval_sec: 10,
  output_dir: 'data/output',
  database_path: 'data/colloquy.db',
  mirror_artifacts: true,
}

export const DEFAULT_TIMEOUTS: TimeoutsConfig = {
  role_assessment_sec: 300,
  solve_sec: 2000,
  peer_review_sec: 2000,
  refine_sec: 2000,
}

// ---------------------------------------------------------------------------
// Full default config document
// ---------------------------------------------------------------------------

export const DEFAULT_CONFIG: ColloquyConfig = {
  config_format_version: CURRENT_CONFIG_FORMAT_VERSION,
  global: DEFAULT_GLOBAL_SETTINGS,
  timeouts: DEFAULT_TIMEOUTS,
  problems: {
    path: 'data/datasets/problems.json',
    skip: 0,
  },
  providers: {
    gemini: DEFAULT_GEMINI_PROVIDER,
    openai: DEFAULT_OPENAI_PROVIDER,
    deepseek: DEFAULT_DEEPSEEK_PROVIDER,
  },
  agents: DEFAULT_AGENTS,
}
