import { describe, it, expect } from "vitest";
import { runSourcePipeline, latestActivityInstant, windowMonths } from "../src/packs/pipeline.js";
import { CanonicalEngagementSchema } from "../src/packs/canonical_schemas.js";
import { daysInMonth } from "../src/packs/dates.js";
import { MemoryLogger } from "../src/shared/logger.js";
import type { RawRecord } from "../src/shared/types.js";
import { filterFor } from "./fixtures.js";

function callRow(id: string, date: string): RawRecord {
  return {
    child_account_identifier_vod__c: "HCP-1",
    call_date_vod__c: date,
    call2_vod_id: id,
    recordtype_name: "Face_to_Face",
    Action: "Attended",
  };
}

function edetailRow(id: string, action: string, date: string): RawRecord {
  return { src_systm_cd: "M3", dgtl_dtl_only_id: id, action, activity_date: date, customer_id: "HCP-1" };
}

describe("runSourcePipeline retention", () => {
  it("drops February and keeps March for a 7-month window from October", () => {
    const result = runSourcePipeline(
      "call",
      [callRow("feb", "2026-02-28"), callRow("mar", "2026-03-01"), callRow("next-year", "2027-01-01")],
      filterFor({ months_to_retain: 7 }),
    );

    expect(result.records.map((r) => r.id)).toEqual(["mar", "next-year"]);
    expect(result.cutoff).toBe("2026-03-01");
    expect(result.rawCount).toBe(3);
    expect(result.mappedCount).toBe(3);
    expect(result.retainedCount).toBe(2);
    expect(result.dropped).toEqual([{ index: 0, reason: "outside_retention", detail: "2026-02-28" }]);
  });

  it("keeps exactly the months inside the window for several window sizes", () => {
    const rows: RawRecord[] = [];
    for (let year = 2023; year <= 2027; year++) {
      for (let month = 1; month <= 12; month++) {
        const mm = String(month).padStart(2, "0");
        rows.push(callRow(`${year}-${mm}-first`, `${year}-${mm}-01`));
        rows.push(callRow(`${year}-${mm}-last`, `${year}-${mm}-${daysInMonth(year, month)}`));
      }
    }
    const refIndex = 2026 * 12 + 9;

    for (const months of [0, 1, 7, 12]) {
      const result = runSourcePipeline("call", rows, filterFor({ months_to_retain: months }));
      const expected = rows
        .filter((r) => {
          const [y, m] = (r.call_date_vod__c ?? "").split("-").map(Number);
          return (y ?? 0) * 12 + ((m ?? 0) - 1) >= refIndex - months;
        })
        .map((r) => r.call2_vod_id);
      expect(result.records.map((r) => r.id)).toEqual(expected);
    }
  });

  it("produces records that satisfy the canonical schema and nothing more", () => {
    const result = runSourcePipeline("call", [callRow("C-1", "04/14/2026")], filterFor());
    for (const record of result.records) {
      expect(CanonicalEngagementSchema.safeParse(record).success).toBe(true);
      expect(Object.keys(record).sort()).toEqual(["action", "activity_date", "channel", "hcp_id", "id", "yrmo"]);
    }
    expect(result.records[0]?.activity_date).toBe("2026-04-14");
    expect(result.records[0]?.yrmo).toBe("2026-04");
  });
});

describe("runSourcePipeline anchors", () => {
  it("keeps the latest month and the one before it for a 2-month data_max window", () => {
    const result = runSourcePipeline(
      "call",
      [callRow("old", "2025-03-31"), callRow("edge", "2025-04-01"), callRow("may", "2025-05-01"), callRow("latest", "2025-06-15")],
      filterFor({ months_to_retain: 2 }),
      { anchor: "data_max" },
    );

    expect(result.referenceInstant.toISOString()).toBe("2025-06-15T00:00:00.000Z");
    expect(result.cutoff).toBe("2025-05-01");
    expect(result.records.map((r) => r.id)).toEqual(["may", "latest"]);
  });

  it("keeps months_to_retain months ending at the latest month with data_max", () => {
    const result = runSourcePipeline(
      "call",
      [callRow("mar", "2026-03-15"), callRow("apr", "2026-04-01"), callRow("oct", "2026-10-02")],
      filterFor({ months_to_retain: 7 }),
      { anchor: "data_max" },
    );

    expect(result.cutoff).toBe("2026-04-01");
    expect(result.records.map((r) => r.id)).toEqual(["apr", "oct"]);
  });

  it("keeps only the latest month when data_max has months_to_retain 0 or 1", () => {
    const rows = [callRow("sep", "2026-09-30"), callRow("oct", "2026-10-02")];
    for (const months of [0, 1]) {
      const result = runSourcePipeline("call", rows, filterFor({ months_to_retain: months }), { anchor: "data_max" });
      expect(result.records.map((r) => r.id)).toEqual(["oct"]);
    }
  });

  it("counts back one month fewer under data_max than under run_time", () => {
    expect(windowMonths(7)).toBe(7);
    expect(windowMonths(7, "run_time")).toBe(7);
    expect(windowMonths(7, "data_max")).toBe(6);
    expect(windowMonths(0, "data_max")).toBe(0);
  });

  it("falls back to the configured reference when a data_max source is empty", () => {
    const result = runSourcePipeline("call", [], filterFor(), { anchor: "data_max" });
    expect(result.referenceInstant.toISOString()).toBe("2026-10-18T00:00:00.000Z");
    expect(result.records).toEqual([]);
  });

  it("finds the latest activity date", () => {
    expect(latestActivityInstant([])).toBeNull();
    const { records } = runSourcePipeline(
      "call",
      [callRow("a", "2026-05-02"), callRow("b", "2026-09-30"), callRow("c", "2026-06-01")],
      filterFor(),
    );
    expect(latestActivityInstant(records)?.toISOString()).toBe("2026-09-30T00:00:00.000Z");
  });
});

describe("runSourcePipeline edetail", () => {
  it("applies the delivered gate after the retention window", () => {
    const result = runSourcePipeline(
      "edetail",
      [
        edetailRow("E-1", "Sent", "2026-02-20"),
        edetailRow("E-1", "Opened", "2026-03-02"),
        edetailRow("E-2", "Delivered", "2026-04-01"),
        edetailRow("E-2", "Clicked", "2026-04-02"),
      ],
      filterFor({ months_to_retain: 7 }),
    );

    expect(result.records.map((r) => `${r.id}:${r.action}`)).toEqual(["E-2:Delivered", "E-2:Clicked"]);
    expect(result.dropped.map((d) => d.reason)).toEqual(["outside_retention", "not_delivered"]);
  });
});

describe("runSourcePipeline logging", () => {
  it("warns once per malformed row and summarizes each drop reason", () => {
    const logger = new MemoryLogger();
    runSourcePipeline(
      "call",
      [callRow("C-1", "2026-05-01"), callRow("C-2", "nope"), callRow("C-3", "2020-01-01")],
      filterFor(),
      { logger },
    );

    expect(logger.messages("WARN")).toEqual(['Dropped call row 1 (bad_date): Unrecognized date value "nope"']);
    expect(logger.messages("INFO")).toEqual([
      "call: 1 record(s) dropped (bad_date)",
      "call: 1 record(s) dropped (outside_retention)",
    ]);
  });
});
