/**
 * Source Pipeline: runs one source from raw rows to canonical records.
 *
 * Steps:
 * 1. Map raw rows with the source's schema mapper (predicates, vocabulary, dates)
 * 2. Resolve the retention reference (run time, or the source's latest date)
 * 3. Keep records on or after the retention cutoff
 * 4. Apply the mapper's post-retention step, if it has one
 *
 * Order is preserved through steps 3 and 4. Nothing is written here.
 */

import { compareDates, formatDate, instantOf, parseDate, retentionCutoff, withinRetention } from "./dates.js";
import { getSchemaMapper } from "./mappers/index.js";
import type { Logger } from "../shared/logger.js";
import type {
  CalendarDate,
  CanonicalEngagement,
  DropReason,
  DroppedRecord,
  RawRecord,
  RetentionAnchor,
  SourceFilterConfig,
  SourceId,
} from "../shared/types.js";

export interface SourcePipelineOptions {
  anchor?: RetentionAnchor;
  logger?: Logger;
  /** Header row of the raw table, checked for required fields */
  columns?: readonly string[] | null;
}

export interface SourcePipelineResult {
  source: SourceId;
  records: CanonicalEngagement[];
  rawCount: number;
  mappedCount: number;
  retainedCount: number;
  /** Reference instant the window was measured from */
  referenceInstant: Date;
  /** First retained day, YYYY-MM-DD */
  cutoff: string;
  dropped: DroppedRecord[];
}

/** Reasons worth a line per record; the rest are reported as counts. */
const WARN_REASONS: ReadonlySet<DropReason> = new Set([
  "bad_date",
  "empty_field",
  "unknown_platform",
  "unsupported_action",
]);

/**
 * Months counted back from the reference month. Under data_max the latest
 * month counts as one of the `monthsToRetain` months kept.
 */
export function windowMonths(monthsToRetain: number, anchor: RetentionAnchor = "run_time"): number {
  return anchor === "data_max" ? Math.max(monthsToRetain - 1, 0) : monthsToRetain;
}

/**
 * Latest activity date among the records, as a UTC midnight instant.
 * Returns null for an empty set.
 */
export function latestActivityInstant(records: readonly CanonicalEngagement[]): Date | null {
  let latest: CalendarDate | null = null;
  for (const r of records) {
    const date = parseDate(r.activity_date);
    if (latest === null || compareDates(date, latest) > 0) latest = date;
  }
  return latest === null ? null : instantOf(latest);
}

function logDrops(logger: Logger, source: SourceId, dropped: readonly DroppedRecord[]): void {
  const counts = new Map<DropReason, number>();
  for (const d of dropped) {
    counts.set(d.reason, (counts.get(d.reason) ?? 0) + 1);
    if (WARN_REASONS.has(d.reason)) {
      logger.warn(`Dropped ${source} row ${d.index} (${d.reason}): ${d.detail}`);
    }
  }
  for (const [reason, count] of counts) {
    logger.info(`${source}: ${count} record(s) dropped (${reason})`);
  }
}

/**
 * Run one source through mapping, the retention window and the mapper's
 * post-retention step.
 */
export function runSourcePipeline(
  source: SourceId,
  rawRecords: readonly RawRecord[],
  filter: SourceFilterConfig,
  options: SourcePipelineOptions = {},
): SourcePipelineResult {
  const mapper = getSchemaMapper(source);
  const mapped = mapper.map(rawRecords, filter, options.columns);

  const monthsBack = windowMonths(filter.retention.monthsToRetain, options.anchor);
  const referenceInstant =
    options.anchor === "data_max"
      ? latestActivityInstant(mapped.records) ?? filter.retention.referenceInstant
      : filter.retention.referenceInstant;

  const retained: CanonicalEngagement[] = [];
  const outside: DroppedRecord[] = [];
  mapped.records.forEach((record, index) => {
    if (withinRetention(parseDate(record.activity_date), monthsBack, referenceInstant)) {
      retained.push(record);
    } else {
      outside.push({ index, reason: "outside_retention", detail: record.activity_date });
    }
  });

  const finalized = mapper.finalize ? mapper.finalize(retained) : { records: retained, dropped: [] };
  const dropped = [...mapped.dropped, ...outside, ...finalized.dropped];

  if (options.logger) logDrops(options.logger, source, dropped);

  return {
    source,
    records: finalized.records,
    rawCount: rawRecords.length,
    mappedCount: mapped.records.length,
    retainedCount: retained.length,
    referenceInstant,
    cutoff: formatDate(retentionCutoff(monthsBack, referenceInstant)),
    dropped,
  };
}
