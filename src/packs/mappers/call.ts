/**
 * Call mapper: face-to-face and virtual rep calls.
 *
 * `recordtype_name` tells the two call kinds apart but does not change the
 * canonical shape: every call lands on the CALL channel.
 */

import { defineSchemaMapper, field } from "./base.js";

export const CALL_CHANNEL = "CALL";

export const callMapper = defineSchemaMapper({
  source: "call",
  requiredFields: [
    "child_account_identifier_vod__c",
    "call_date_vod__c",
    "call2_vod_id",
    "recordtype_name",
    "Action",
  ],
  extract: (r) => ({
    ok: true,
    fields: {
      hcpId: field(r, "child_account_identifier_vod__c"),
      rawDate: field(r, "call_date_vod__c"),
      id: field(r, "call2_vod_id"),
      channel: CALL_CHANNEL,
      action: field(r, "Action"),
    },
  }),
});
