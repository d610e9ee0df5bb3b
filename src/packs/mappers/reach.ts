/**
 * Reach mapper: last-mile-reach (LMMR) broadcasts.
 */

import { defineSchemaMapper, field } from "./base.js";
import type { CanonicalEngagement } from "../../shared/types.js";

export const REACH_CHANNEL = "LMMR";

const SORT_KEYS: (keyof CanonicalEngagement)[] = ["hcp_id", "activity_date", "id", "action"];

function compareReach(a: CanonicalEngagement, b: CanonicalEngagement): number {
  for (const key of SORT_KEYS) {
    if (a[key] < b[key]) return -1;
    if (a[key] > b[key]) return 1;
  }
  return 0;
}

export const reachMapper = defineSchemaMapper({
  source: "reach",
  requiredFields: ["customer_id", "activity_date", "sevc_id", "action"],
  extract: (r) => ({
    ok: true,
    fields: {
      hcpId: field(r, "customer_id"),
      rawDate: field(r, "activity_date"),
      id: field(r, "sevc_id"),
      // raw content never decides the channel
      channel: REACH_CHANNEL,
      action: field(r, "action"),
    },
  }),
  // Array.prototype.sort is stable, so equal keys keep source order
  arrange: (rows) => ({ records: rows.map((r) => r.record).sort(compareReach), dropped: [] }),
});
