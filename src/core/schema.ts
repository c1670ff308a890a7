import { z } from 'zod';
import { PermanentProviderError } from './errors';

export const isoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');
const clockTime = z.string().regex(/^\d{1,2}:\d{2}$/, 'expected HH:MM');

export const recommendationActionSchema = z.enum(['buy', 'sell', 'hold']);
export const confidenceLevelSchema = z.enum(['high', 'medium', 'low']);

export const sessionWindowSchema = z.object({
  start: clockTime,
  end: clockTime
});

export const actionBandSchema = z
  .object({
    action: recommendationActionSchema,
    min: z.number().optional(),
    max: z.number().optional()
  })
  .refine((b) => b.min === undefined || b.max === undefined || b.min < b.max, {
    message: 'band min must be below max'
  });

export const actionBandsConfigSchema = z.object({
  neutralAction: recommendationActionSchema,
  bands: z.array(actionBandSchema).min(1),
  highConfidenceLevels: z.array(confidenceLevelSchema),
  confidenceThresholds: z.object({
    high: z.number().nonnegative(),
    medium: z.number().nonnegative()
  })
});

export const pipelineConfigSchema = z.object({
  timezone: z.string().min(1),
  sessions: z.object({
    refresh: sessionWindowSchema,
    select: sessionWindowSchema
  }),
  calendar: z.object({
    blackoutDates: z.array(isoDateSchema),
    holidaysFile: z.string()
  }),
  storage: z
    .object({
      rootPrefix: z.string(),
      archivePrefix: z.string().min(1),
      manifestKey: z.string().min(1)
    })
    .refine((s) => s.archivePrefix.startsWith(s.rootPrefix) && s.manifestKey.startsWith(s.rootPrefix), {
      message: 'archivePrefix and manifestKey must live under rootPrefix'
    })
    .refine((s) => !s.manifestKey.startsWith(s.archivePrefix), {
      message: 'manifestKey must not live under archivePrefix'
    }),
  fetch: z.object({
    concurrency: z.number().int().min(1),
    timeoutMs: z.number().int().positive(),
    maxRetries: z.number().int().min(0),
    baseDelayMs: z.number().min(0),
    period: z.string(),
    interval: z.string()
  }),
  selection: z.object({
    maxPicks: z.number().int().positive()
  }),
  actionBands: actionBandsConfigSchema,
  universeFile: z.string()
});

export const priceBarSchema = z.object({
  date: isoDateSchema,
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
  volume: z.number().nonnegative()
});

export const storedPriceSchema = z.object({
  instrumentId: z.string(),
  bars: z.array(priceBarSchema),
  lastClose: z.number(),
  atrPct: z.number().nullable(),
  updatedAt: z.string()
});

export const priceStoreDocumentSchema = z.object({
  updatedAt: z.string(),
  instruments: z.record(storedPriceSchema)
});

export const instrumentMetaSchema = z.object({
  instrumentId: z.string().min(1),
  name: z.string(),
  category: z.string().optional(),
  market: z.string().optional()
});

export const metadataDocumentSchema = z.object({
  fetchedAt: z.string(),
  instruments: z.array(instrumentMetaSchema)
});

export const selectionPickSchema = z.object({
  instrumentId: z.string(),
  name: z.string(),
  rank: z.number().int().positive(),
  score: z.number(),
  category: z.string(),
  rationale: z.string()
});

export const selectionArtifactSchema = z.object({
  selectionDate: isoDateSchema,
  generatedAt: z.string(),
  picks: z.array(selectionPickSchema)
});

export const metricsSnapshotSchema = z.record(z.union([z.number(), z.string(), z.null()]));

export const archiveEntrySchema = z.object({
  selectionDate: isoDateSchema,
  instrumentId: z.string(),
  metricsSnapshot: metricsSnapshotSchema,
  createdAt: z.string()
});

export const manifestItemSchema = z.object({
  key: z.string(),
  bytes: z.number().int().nonnegative(),
  checksum: z.string(),
  mtime: z.string()
});

export const manifestSchema = z.object({
  generatedAt: z.string(),
  items: z.array(manifestItemSchema)
});

export const recommendationRecordSchema = z.object({
  instrumentId: z.string(),
  baseScore: z.number(),
  baseAction: recommendationActionSchema,
  refinedScore: z.number().optional(),
  refinedAction: recommendationActionSchema.optional(),
  finalScore: z.number(),
  finalAction: recommendationActionSchema,
  baseConfidence: confidenceLevelSchema,
  confidence: confidenceLevelSchema,
  hasRefinement: z.boolean(),
  overrideFlag: z.boolean(),
  atrPct: z.number().nullable(),
  stopLossPct: z.number()
});

export const refinementEntrySchema = z.object({
  instrumentId: z.string(),
  score: z.number(),
  action: recommendationActionSchema.optional(),
  confidence: confidenceLevelSchema.optional()
});

export const refinementLayerSchema = z.object({
  name: z.string().min(1),
  selectionDate: isoDateSchema,
  entries: z.array(refinementEntrySchema)
});

export const recommendationSetSchema = z.object({
  selectionDate: isoDateSchema,
  generatedAt: z.string(),
  layers: z.array(refinementLayerSchema),
  records: z.array(recommendationRecordSchema),
  summary: z.object({
    total: z.number().int(),
    buy: z.number().int(),
    sell: z.number().int(),
    hold: z.number().int(),
    overridden: z.number().int()
  })
});

export type SessionWindow = z.infer<typeof sessionWindowSchema>;
export type RecommendationAction = z.infer<typeof recommendationActionSchema>;
export type ConfidenceLevel = z.infer<typeof confidenceLevelSchema>;
export type ActionBand = z.infer<typeof actionBandSchema>;
export type ActionBandsConfig = z.infer<typeof actionBandsConfigSchema>;
export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;
export type PriceBar = z.infer<typeof priceBarSchema>;
export type StoredPrice = z.infer<typeof storedPriceSchema>;
export type PriceStoreDocument = z.infer<typeof priceStoreDocumentSchema>;
export type InstrumentMeta = z.infer<typeof instrumentMetaSchema>;
export type MetadataDocument = z.infer<typeof metadataDocumentSchema>;
export type SelectionPick = z.infer<typeof selectionPickSchema>;
export type SelectionArtifact = z.infer<typeof selectionArtifactSchema>;
export type MetricsSnapshot = z.infer<typeof metricsSnapshotSchema>;
export type ArchiveEntry = z.infer<typeof archiveEntrySchema>;
export type ManifestItem = z.infer<typeof manifestItemSchema>;
export type Manifest = z.infer<typeof manifestSchema>;
export type RecommendationRecord = z.infer<typeof recommendationRecordSchema>;
export type RecommendationSet = z.infer<typeof recommendationSetSchema>;
export type RefinementEntry = z.infer<typeof refinementEntrySchema>;
export type RefinementLayer = z.infer<typeof refinementLayerSchema>;

const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);

export const validatePipelineConfig = (
  raw: unknown
): { success: true; value: PipelineConfig } | { success: false; errors: string[] } => {
  const result = pipelineConfigSchema.safeParse(raw);
  if (result.success) {
    return { success: true, value: result.data };
  }
  return { success: false, errors: formatIssues(result.error) };
};

export const parseDocument = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, label: string): T => {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new PermanentProviderError(`${label} failed validation: ${formatIssues(result.error).join('; ')}`);
  }
  return result.data;
};
