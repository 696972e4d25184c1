/**
 * Colloquy - Main module exports
 * Public API surface for running multi-agent debates
 */

// Core errors
export * from './core/errors.js'
// Utilities
export { createLogger, childLogger, logger } from './utils/logger.js'
export * from './utils/helpers.js'

// Agents
export * from './modules/agent/index.js'

// Configuration
export * from './modules/config/index.js'

// Debate sessions
export * from './modules/debate/index.js'
export * from './modules/debate-runner/index.js'
export * from './modules/problem-source/index.js'

// Persistence
export * from './modules/document-writer/index.js'
export { createDatabaseService, IN_MEMORY_DATABASE, openDatabase } from './persistence/database.js'
export type { DatabaseService } from './persistence/database.js'
export { runMigrations } from './persistence/migrations/index.js'
