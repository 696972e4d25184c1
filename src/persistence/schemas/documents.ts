/**
 * Zod schemas for the document store persistence layer.
 */

import { z } from 'zod'

/** Collection and document ids: non-empty, no path separators */
export const DocumentKeySchema = z
  .string()
  .min(1)
  .max(200)
  .regex(/^[^/\\]+$/, 'must not contain path separators')

export const DocumentBodySchema = z.record(z.string(), z.unknown())
export type DocumentBody = z.infer<typeof DocumentBodySchema>

/** Raw row as returned by SQLite */
export const DocumentRowSchema = z.object({
  collection: z.string(),
  id: z.string(),
  body: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
})

/** Row with its JSON body decoded */
export interface StoredDocument {
  collection: string
  id: string
  body: DocumentBody
  createdAt: string
  updatedAt: string
}
