/**
 * Canonical Schema: the six-field engagement record every source maps into,
 * and its serialized column contract.
 */
import { z } from "zod";

import { formatDate, toYrmo } from "./dates.js";
import type { CalendarDate, CanonicalEngagement } from "../shared/types.js";

export const CanonicalEngagementSchema = z
  .object({
    hcp_id: z.string().min(1),
    activity_date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD"),
    yrmo: z.string().regex(/^\d{4}-\d{2}$/, "Expected YYYY-MM"),
    id: z.string().min(1),
    channel: z.string().min(1),
    action: z.string().min(1),
  })
  .strict()
  .refine((r) => r.activity_date.startsWith(r.yrmo), {
    message: "yrmo must be the year-month of activity_date",
    path: ["yrmo"],
  });

/** Serialized column order. */
export const CANONICAL_COLUMNS = ["HCP_ID", "ACTIVITY_DATE", "YRMO", "ID", "CHANNEL", "ACTION"] as const;

export type CanonicalColumn = (typeof CANONICAL_COLUMNS)[number];

const COLUMN_FIELDS: Record<CanonicalColumn, keyof CanonicalEngagement> = {
  HCP_ID: "hcp_id",
  ACTIVITY_DATE: "activity_date",
  YRMO: "yrmo",
  ID: "id",
  CHANNEL: "channel",
  ACTION: "action",
};

/**
 * Build a canonical record. `yrmo` is always derived here, never taken from input.
 */
export function buildEngagement(fields: {
  hcpId: string;
  date: CalendarDate;
  id: string;
  channel: string;
  action: string;
}): CanonicalEngagement {
  return {
    hcp_id: fields.hcpId,
    activity_date: formatDate(fields.date),
    yrmo: toYrmo(fields.date),
    id: fields.id,
    channel: fields.channel,
    action: fields.action,
  };
}

/** Values of a record in CANONICAL_COLUMNS order. */
export function toRow(record: CanonicalEngagement): string[] {
  return CANONICAL_COLUMNS.map((c) => record[COLUMN_FIELDS[c]]);
}
