import { z } from "zod";
import type { CheckpointState } from "@stop-sync/types";

const resultSchema = z.object({
  code: z.string(),
  success: z.boolean(),
  correctedName: z.string().optional(),
  street: z.string().optional(),
  error: z.string().optional(),
  attempts: z.number().int().nonnegative(),
});

const checkpointSchema = z.object({
  runId: z.string(),
  savedAt: z.string(),
  previousLabel: z.string().nullable().optional(),
  currentLabel: z.string().optional(),
  total: z.number().int().nonnegative(),
  completed: z.array(z.string()),
  remaining: z.array(z.string()),
  results: z.array(resultSchema),
});

/** Validate a decoded checkpoint document */
export function parseCheckpoint(value: unknown): CheckpointState {
  return checkpointSchema.parse(value);
}
