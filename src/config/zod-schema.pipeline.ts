import { z } from "zod";

const IdentifierSchema = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "Must be a plain table or column identifier");

const FetchModeSchema = z.union([z.literal("latest"), z.literal("unprocessed")]);
const DedupCheckSchema = z.union([z.literal("link"), z.literal("headline"), z.literal("id")]);
const RubricSchema = z.union([z.literal("inclusive"), z.literal("strict")]);
const EvaluationFormatSchema = z.union([z.literal("json"), z.literal("text")]);
const RetentionOrderSchema = z.union([
  z.literal("original_published_at"),
  z.literal("processed_at"),
]);
const MarkProcessedSchema = z.union([
  z.literal("never"),
  z.literal("stored"),
  z.literal("handled"),
]);

const SourceColumnsSchema = z
  .object({
    id: IdentifierSchema,
    headline: IdentifierSchema,
    description: IdentifierSchema,
    source: IdentifierSchema,
    publishedAt: IdentifierSchema,
    link: IdentifierSchema,
    ingestedAt: IdentifierSchema,
    processed: IdentifierSchema,
  })
  .strict();

const RetentionSchema = z
  .object({
    ceiling: z.number().int().min(1),
    orderBy: RetentionOrderSchema,
  })
  .strict();

const TickerSchema = z.string().regex(/^[A-Z0-9]{1,12}$/, "Ticker must be upper-case alphanumeric");

export const PipelineProfileSchema = z
  .object({
    name: z.string().min(1),
    sourceTable: IdentifierSchema,
    destinationTable: IdentifierSchema,
    columns: SourceColumnsSchema,
    fetchMode: FetchModeSchema,
    batchSize: z.number().int().positive().max(500),
    recencyHours: z.number().positive(),
    dedupChecks: z.array(DedupCheckSchema).min(1),
    dedupHeadlineWindowHours: z.number().positive(),
    rubric: RubricSchema,
    evaluationFormat: EvaluationFormatSchema,
    retention: RetentionSchema,
    markProcessed: MarkProcessedSchema,
    defaultTicker: TickerSchema,
    placeholderTicker: TickerSchema,
    processingVersion: z.string().min(1),
  })
  .strict();

export const PipelineProfileOverrideSchema = z
  .object({
    extends: z.string().optional(),
    sourceTable: IdentifierSchema.optional(),
    destinationTable: IdentifierSchema.optional(),
    columns: SourceColumnsSchema.partial().optional(),
    fetchMode: FetchModeSchema.optional(),
    batchSize: z.number().int().positive().max(500).optional(),
    recencyHours: z.number().positive().optional(),
    dedupChecks: z.array(DedupCheckSchema).min(1).optional(),
    dedupHeadlineWindowHours: z.number().positive().optional(),
    rubric: RubricSchema.optional(),
    evaluationFormat: EvaluationFormatSchema.optional(),
    retention: RetentionSchema.partial().optional(),
    markProcessed: MarkProcessedSchema.optional(),
    defaultTicker: TickerSchema.optional(),
    placeholderTicker: TickerSchema.optional(),
    processingVersion: z.string().min(1).optional(),
  })
  .strict();
