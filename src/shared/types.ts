/** Engagement sources, in consolidation order. */
export type SourceId = "call" | "edetail" | "events" | "reach";

export const SOURCE_ORDER: readonly SourceId[] = ["call", "edetail", "events", "reach"];

/** A raw tabular row as produced by the table reader. Field set is source-specific. */
export type RawRecord = Readonly<Record<string, string>>;

/** Rows of one source table. `columns` is the header row, null when the format has none. */
export interface RawTable {
  columns: string[] | null;
  records: RawRecord[];
}

/** Calendar date without time or zone. `month` is 1-based. */
export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

/** Canonical engagement record shared by every source. */
export interface CanonicalEngagement {
  hcp_id: string;
  /** YYYY-MM-DD */
  activity_date: string;
  /** YYYY-MM, always derived from activity_date */
  yrmo: string;
  id: string;
  channel: string;
  action: string;
}

/** How the reference instant for the retention window is chosen. */
export type RetentionAnchor = "run_time" | "data_max";

export interface RetentionWindowConfig {
  readonly monthsToRetain: number;
  readonly referenceInstant: Date;
}

/** Exact-match predicate over one raw field. */
export interface FieldPredicate {
  readonly field: string;
  readonly expected: string;
}

export interface SourceFilterConfig {
  readonly predicates: readonly FieldPredicate[];
  readonly retention: RetentionWindowConfig;
}

/** Reason a single raw record was left out of a source's output. */
export type DropReason =
  | "predicate_mismatch"
  | "bad_date"
  | "empty_field"
  | "unknown_platform"
  | "unsupported_action"
  | "duplicate"
  | "outside_retention"
  | "not_delivered";

export interface DroppedRecord {
  index: number;
  reason: DropReason;
  detail: string;
}

/** Output of a schema mapper before the retention window is applied. */
export interface MappingResult {
  records: CanonicalEngagement[];
  dropped: DroppedRecord[];
}

/** Consolidated dataset, ordered call → edetail → events → reach. */
export interface UnifiedDataset {
  readonly records: readonly CanonicalEngagement[];
  readonly sourceCounts: Readonly<Record<SourceId, number>>;
}
