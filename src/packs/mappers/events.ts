/**
 * Events mapper: conference and event registrations. Channel and action
 * arrive close to canonical and are copied as-is.
 */

import { defineSchemaMapper, field } from "./base.js";

export const eventsMapper = defineSchemaMapper({
  source: "events",
  requiredFields: ["customer_id", "ACTVY_STRT_DT", "conference_id", "channel", "action"],
  extract: (r) => ({
    ok: true,
    fields: {
      hcpId: field(r, "customer_id"),
      rawDate: field(r, "ACTVY_STRT_DT"),
      id: field(r, "conference_id"),
      channel: field(r, "channel"),
      action: field(r, "action"),
    },
  }),
});
