import { z } from 'zod';
import { PIPELINE_STATES, STAGES } from '../pipeline/states.js';

// 未知のフィールドは読み書きの間で保持する（前方互換）
export const articleRecordSchema = z
  .object({
    sourceId: z.string().min(1),
    title: z.string(),
    originalUrl: z.string(),
    author: z.string().optional(),
    summary: z.string().optional(),
    state: z.enum(PIPELINE_STATES),
    generationJobId: z.string().min(1).optional(),
    generationStartedAt: z.string().optional(),
    artifactLocation: z.string().min(1).optional(),
    artifactBytes: z.number().int().nonnegative().optional(),
    durationSeconds: z.number().nonnegative().optional(),
    attempts: z.record(z.enum(STAGES), z.number().int().nonnegative()).default({}),
    lastError: z.string().optional(),
    lastAttemptAt: z.string().optional(),
    abandonedFrom: z.enum(PIPELINE_STATES).optional(),
    createdAt: z.string(),
    updatedAt: z.string(),
    publishedAt: z.string().optional(),
  })
  .passthrough();

export type ArticleRecord = z.infer<typeof articleRecordSchema>;

export const STORE_VERSION = 1;

export const storeDocumentSchema = z
  .object({
    version: z.literal(STORE_VERSION),
    cursor: z.string().nullable().default(null),
    records: z.record(z.string(), articleRecordSchema).default({}),
  })
  .passthrough();

export type StoreDocument = z.infer<typeof storeDocumentSchema>;

export function emptyDocument(): StoreDocument {
  return { version: STORE_VERSION, cursor: null, records: {} };
}
