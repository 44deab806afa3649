import { z } from "zod";
import { PipelineProfileOverrideSchema } from "./zod-schema.pipeline.js";

const LlmSchema = z
  .object({
    model: z.string().min(1).optional(),
    evaluationModel: z.string().min(1).optional(),
    transformModel: z.string().min(1).optional(),
  })
  .strict()
  .optional();

const NotifySchema = z
  .object({
    telegram: z
      .object({
        chatIds: z.array(z.union([z.string(), z.number()])).optional(),
      })
      .strict()
      .optional(),
    notifyOnRun: z.boolean().optional(),
  })
  .strict()
  .optional();

const LoopSchema = z
  .object({
    intervalSeconds: z.number().positive().optional(),
    maxConsecutiveFailures: z.number().int().positive().optional(),
    itemDelayMs: z.number().int().min(0).optional(),
  })
  .strict()
  .optional();

export const NewsdeskConfigSchema = z
  .object({
    profiles: z.record(z.string(), PipelineProfileOverrideSchema).optional(),
    llm: LlmSchema,
    notify: NotifySchema,
    loop: LoopSchema,
  })
  .strict();
