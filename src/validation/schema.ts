import { z } from "zod";
import { READOUT_OPTIONS, SCALE_OPTIONS } from "./checks.js";

// ============================================
// Typed request model
// Parsed only after the accumulating checks pass,
// so a failure here is an internal inconsistency
// ============================================

const indexSchema = z.number().int().nonnegative();

export const predictionRangeSchema = z.union([
  z.tuple([]),
  z.tuple([indexSchema, indexSchema]),
]);

export const predictionTaskSchema = z.object({
  name: z.string(),
  type: z.string(),
  cell_type: z.string(),
  species: z.string(),
  scale: z.enum(SCALE_OPTIONS).optional(),
});

export const predictionRequestSchema = z.object({
  readout: z.enum(READOUT_OPTIONS),
  prediction_tasks: z.array(predictionTaskSchema),
  sequences: z.record(z.string()),
  prediction_ranges: z.record(predictionRangeSchema).optional(),
  upstream_seq: z.string().optional(),
  downstream_seq: z.string().optional(),
});

export type PredictionRange = z.infer<typeof predictionRangeSchema>;
export type PredictionTask = z.infer<typeof predictionTaskSchema>;
export type PredictionRequest = z.infer<typeof predictionRequestSchema>;
