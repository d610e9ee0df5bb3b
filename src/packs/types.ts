/**
 * Source Configuration Types: zod schemas for the per-source and
 * consolidation config files under config/.
 */
import { z } from "zod";

export const DEFAULT_MONTHS_TO_RETAIN = 7;

// ── Per-source config ────────────────────────────────────────────────

/**
 * `months_to_retain` is the only reserved key; every other key is an
 * exact-match predicate on a raw field of the same name.
 */
export const SourceFiltersSchema = z
  .object({
    months_to_retain: z.number().int().nonnegative().default(DEFAULT_MONTHS_TO_RETAIN),
  })
  .catchall(z.union([z.string(), z.number(), z.boolean()]));

export const SourceConfigSchema = z.object({
  source: z.object({
    path: z.string().min(1),
  }),
  filters: SourceFiltersSchema.default({}),
  output: z.object({
    csv: z.string().min(1),
  }),
});

export type SourceFilters = z.infer<typeof SourceFiltersSchema>;
export type SourceConfig = z.infer<typeof SourceConfigSchema>;

// ── Consolidation config ─────────────────────────────────────────────

export const ConsolidateConfigSchema = z.object({
  output: z.object({
    csv: z.string().min(1),
  }),
});

export type ConsolidateConfig = z.infer<typeof ConsolidateConfigSchema>;
