// Persisted shapes. Field names are snake_case because status.json is read
// by the status dashboard.

import { z } from "zod";

export const runOutcomeSchema = z.enum([
  "succeeded",
  "failed",
  "timed_out",
  "errored",
]);

export type RunOutcome = z.infer<typeof runOutcomeSchema>;

export const runResultSchema = z.object({
  name: z.string(),
  source: z.string(),
  destination: z.string(),
  /** ISO timestamp when the job started. */
  last_run: z.string(),
  /** Seconds. */
  duration: z.number(),
  success: z.boolean(),
  return_code: z.number().int(),
  // documents written before outcomes were recorded lack the field
  outcome: runOutcomeSchema.optional(),
  stats: z.record(z.string(), z.string()).default({}),
  stdout: z.string().default(""),
  stderr: z.string().default(""),
  error: z.string().optional(),
});

export type RunResult = z.infer<typeof runResultSchema>;

export const batchSummarySchema = z.object({
  successful: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
  total: z.number().int().nonnegative(),
});

export type LastSummary = z.infer<typeof batchSummarySchema>;

export const statusDocumentSchema = z.object({
  jobs: z.record(z.string(), runResultSchema).default({}),
  last_run: z.string().nullable().default(null),
  total_runs: z.number().int().nonnegative().default(0),
  last_summary: batchSummarySchema.optional(),
});

export type StatusDocument = z.infer<typeof statusDocumentSchema>;

export function emptyStatusDocument(): StatusDocument {
  return { jobs: {}, last_run: null, total_runs: 0 };
}
