/**
 * Edetail mapper: digital detailing across several platform families.
 *
 * The `src_systm_cd` column names the platform. Each platform belongs to a
 * family that decides which actions it can report:
 *   vendor_edetail     CARENET, Medpeer            Delivered, Opened
 *   email              M3, M3-Quiz, M3-MM, M3-OPD  Delivered, Opened, Clicked
 *   additional_vendor  NMO                         Delivered, Opened, Clicked
 *
 * Output is grouped by family in the order above; within a family rows keep
 * source order. Vendor edetail and email rows collapse exact duplicates.
 */

import { defineSchemaMapper, field } from "./base.js";
import type { Extraction, MappedRow } from "./base.js";
import type { CanonicalEngagement, DroppedRecord, MappingResult, RawRecord } from "../../shared/types.js";

export type EdetailFamily = "vendor_edetail" | "email" | "additional_vendor";

export type EdetailAction = "Delivered" | "Opened" | "Clicked";

interface PlatformSpec {
  channel: string;
  family: EdetailFamily;
}

export const EDETAIL_PLATFORMS: Readonly<Record<string, PlatformSpec>> = {
  M3: { channel: "EMAIL_M3_MR_KUN", family: "email" },
  "M3-Quiz": { channel: "EMAIL_M3_QUIZ", family: "email" },
  "M3-MM": { channel: "EMAIL_M3_MM", family: "email" },
  "M3-OPD": { channel: "EMAIL_M3_OPD", family: "email" },
  CARENET: { channel: "EDETAIL_CARENET", family: "vendor_edetail" },
  Medpeer: { channel: "EDETAIL_MEDPEER", family: "vendor_edetail" },
  NMO: { channel: "EDETAIL_NMO", family: "additional_vendor" },
};

interface FamilySpec {
  actions: readonly EdetailAction[];
  aliases: Readonly<Record<string, EdetailAction>>;
  collapseDuplicates: boolean;
}

const FAMILIES: Record<EdetailFamily, FamilySpec> = {
  vendor_edetail: {
    actions: ["Delivered", "Opened"],
    aliases: { Sent: "Delivered" },
    collapseDuplicates: true,
  },
  email: {
    actions: ["Delivered", "Opened", "Clicked"],
    aliases: { Sent: "Delivered" },
    collapseDuplicates: true,
  },
  additional_vendor: {
    actions: ["Delivered", "Opened", "Clicked"],
    aliases: { Sent: "Delivered", Viewed: "Opened" },
    collapseDuplicates: false,
  },
};

const FAMILY_ORDER: readonly EdetailFamily[] = ["vendor_edetail", "email", "additional_vendor"];

const CHANNEL_FAMILY = new Map<string, EdetailFamily>(
  Object.values(EDETAIL_PLATFORMS).map((p) => [p.channel, p.family]),
);

function isEdetailAction(value: string, allowed: readonly EdetailAction[]): value is EdetailAction {
  return allowed.some((a) => a === value);
}

/** Canonical action for a raw action on a platform family, or null when unsupported. */
export function normalizeEdetailAction(family: EdetailFamily, rawAction: string): EdetailAction | null {
  const spec = FAMILIES[family];
  const action = Object.hasOwn(spec.aliases, rawAction) ? spec.aliases[rawAction] : rawAction;
  return isEdetailAction(action, spec.actions) ? action : null;
}

function extract(r: RawRecord): Extraction {
  const platformCode = field(r, "src_systm_cd");
  const platform = Object.hasOwn(EDETAIL_PLATFORMS, platformCode) ? EDETAIL_PLATFORMS[platformCode] : undefined;
  if (!platform) {
    return { ok: false, reason: "unknown_platform", detail: `platform "${platformCode}"` };
  }
  const rawAction = field(r, "action");
  const action = normalizeEdetailAction(platform.family, rawAction);
  if (!action) {
    return {
      ok: false,
      reason: "unsupported_action",
      detail: `action "${rawAction}" on ${platform.channel}`,
    };
  }
  return {
    ok: true,
    fields: {
      hcpId: field(r, "customer_id"),
      rawDate: field(r, "activity_date"),
      id: field(r, "dgtl_dtl_only_id"),
      channel: platform.channel,
      action,
    },
  };
}

function engagementKey(r: CanonicalEngagement): string {
  return [r.activity_date, r.hcp_id, r.id, r.channel, r.action].join("\u0000");
}

function familyOf(r: CanonicalEngagement): EdetailFamily {
  const family = CHANNEL_FAMILY.get(r.channel);
  if (!family) throw new Error(`Edetail channel without a platform family: ${r.channel}`);
  return family;
}

/**
 * Group rows by family and collapse duplicates where the family asks for it.
 */
function arrangeByFamily(rows: MappedRow[]): MappingResult {
  const groups = new Map<EdetailFamily, MappedRow[]>(FAMILY_ORDER.map((f) => [f, []]));
  for (const row of rows) {
    groups.get(familyOf(row.record))?.push(row);
  }

  const records: CanonicalEngagement[] = [];
  const dropped: DroppedRecord[] = [];
  for (const family of FAMILY_ORDER) {
    const seen = new Set<string>();
    for (const row of groups.get(family) ?? []) {
      if (FAMILIES[family].collapseDuplicates) {
        const key = engagementKey(row.record);
        if (seen.has(key)) {
          dropped.push({ index: row.index, reason: "duplicate", detail: `duplicate ${row.record.action} for ${row.record.id}` });
          continue;
        }
        seen.add(key);
      }
      records.push(row.record);
    }
  }
  return { records, dropped };
}

/**
 * Keep only activities that were delivered: a record survives when some
 * record with the same id has action Delivered. Indices in `dropped` refer
 * to positions in the input array.
 */
export function applyDeliveredGate(records: CanonicalEngagement[]): MappingResult {
  const delivered = new Set(records.filter((r) => r.action === "Delivered").map((r) => r.id));
  const kept: CanonicalEngagement[] = [];
  const dropped: DroppedRecord[] = [];
  records.forEach((r, index) => {
    if (delivered.has(r.id)) kept.push(r);
    else dropped.push({ index, reason: "not_delivered", detail: `no Delivered record for ${r.id}` });
  });
  return { records: kept, dropped };
}

export const edetailMapper = defineSchemaMapper({
  source: "edetail",
  requiredFields: ["src_systm_cd", "dgtl_dtl_only_id", "action", "activity_date", "customer_id"],
  extract,
  arrange: arrangeByFamily,
  finalize: applyDeliveredGate,
});
