/**
 * Shared fixture project for runtime and CLI tests.
 *
 * With reference date 2026-10-18 and a 7-month window (cutoff 2026-03-01)
 * the unified output is exactly UNIFIED_CSV.
 */

import { mkdirSync, mkdtempSync, writeFileSync } from "fs";
import os from "os";
import path from "path";

import { buildFilterConfig } from "../src/packs/filters.js";
import { SourceFiltersSchema } from "../src/packs/types.js";
import type { SourceFilterConfig } from "../src/shared/types.js";

export const REFERENCE = new Date(Date.UTC(2026, 9, 18));

export function makeTempDir(prefix = "hcp-engagement-"): string {
  return mkdtempSync(path.join(os.tmpdir(), prefix));
}

/** SourceFilterConfig from a config-file style `filters` object. */
export function filterFor(
  filters: Record<string, string | number | boolean> = {},
  reference: Date = REFERENCE,
): SourceFilterConfig {
  return buildFilterConfig(SourceFiltersSchema.parse(filters), reference);
}

const FILES: Record<string, string> = {
  "config/call.json": JSON.stringify({
    source: { path: "data/call.csv" },
    filters: { product_external_id_vod__c: "P1", months_to_retain: 7 },
    output: { csv: "outputs/call.csv" },
  }),
  "config/edetail.json": JSON.stringify({
    source: { path: "data/edetail.csv" },
    filters: { months_to_retain: 7 },
    output: { csv: "outputs/edetail.csv" },
  }),
  "config/events.json": JSON.stringify({
    source: { path: "data/events.csv" },
    filters: { product_id: 101 },
    output: { csv: "outputs/events.csv" },
  }),
  "config/reach.json": JSON.stringify({
    source: { path: "data/reach.csv" },
    filters: {},
    output: { csv: "outputs/reach.csv" },
  }),
  "config/consolidate.json": JSON.stringify({
    output: { csv: "outputs/hcp_engagement.csv" },
  }),
  "data/call.csv": [
    "child_account_identifier_vod__c,call_date_vod__c,call2_vod_id,recordtype_name,Action,product_external_id_vod__c",
    "HCP-1,2026-04-14,C-1,Face_to_Face,Attended,P1",
    "HCP-2,2026-02-10,C-2,Virtual,Attended,P1",
    "HCP-3,2026-05-01,C-3,Virtual,Attended,P2",
  ].join("\n"),
  "data/edetail.csv": [
    "src_systm_cd,dgtl_dtl_only_id,action,activity_date,customer_id",
    "M3,E-1,Sent,2026-05-10,HCP-1",
    "M3,E-1,Opened,2026-05-11,HCP-1",
    "CARENET,E-2,Opened,2026-06-02,HCP-2",
    "NMO,E-3,Delivered,06/15/2026,HCP-3",
    "NMO,E-3,Viewed,06/16/2026,HCP-3",
  ].join("\n"),
  "data/events.csv": [
    "customer_id,ACTVY_STRT_DT,conference_id,product_id,channel,action",
    "HCP-2,2026-07-12 09:00:00,EV-1,101,EVENT,Attended",
    "HCP-4,2026-07-12,EV-2,101,,Attended",
  ].join("\n"),
  "data/reach.csv": [
    "customer_id,activity_date,sevc_id,action",
    "HCP-2,2026-08-01,S-1,Delivered",
    "HCP-1,2026-08-01,S-1,Opened",
  ].join("\n"),
};

export const UNIFIED_CSV = [
  "HCP_ID,ACTIVITY_DATE,YRMO,ID,CHANNEL,ACTION",
  "HCP-1,2026-04-14,2026-04,C-1,CALL,Attended",
  "HCP-1,2026-05-10,2026-05,E-1,EMAIL_M3_MR_KUN,Delivered",
  "HCP-1,2026-05-11,2026-05,E-1,EMAIL_M3_MR_KUN,Opened",
  "HCP-3,2026-06-15,2026-06,E-3,EDETAIL_NMO,Delivered",
  "HCP-3,2026-06-16,2026-06,E-3,EDETAIL_NMO,Opened",
  "HCP-2,2026-07-12,2026-07,EV-1,EVENT,Attended",
  "HCP-1,2026-08-01,2026-08,S-1,LMMR,Opened",
  "HCP-2,2026-08-01,2026-08,S-1,LMMR,Delivered",
].join("\n") + "\n";

/** Write the fixture project into `root` and return `root`. */
export function writeFixtureProject(root: string): string {
  for (const [rel, content] of Object.entries(FILES)) {
    const target = path.join(root, rel);
    mkdirSync(path.dirname(target), { recursive: true });
    writeFileSync(target, content);
  }
  return root;
}
