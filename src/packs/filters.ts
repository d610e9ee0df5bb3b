/**
 * Filter Predicates: turns a config `filters` block into a
 * SourceFilterConfig and evaluates exact-match predicates on raw records.
 *
 * Field names are data from the config file; nothing here knows which
 * source a predicate belongs to.
 */

import type { FieldPredicate, RawRecord, SourceFilterConfig } from "../shared/types.js";
import type { SourceFilters } from "./types.js";

export function buildFilterConfig(filters: SourceFilters, referenceInstant: Date): SourceFilterConfig {
  const { months_to_retain, ...rest } = filters;
  const predicates: FieldPredicate[] = Object.entries(rest).map(([field, expected]) => ({
    field,
    expected: String(expected),
  }));
  return Object.freeze({
    predicates: Object.freeze(predicates),
    retention: Object.freeze({
      monthsToRetain: months_to_retain,
      referenceInstant: new Date(referenceInstant.getTime()),
    }),
  });
}

/** Values compare as trimmed strings, so 101 in config matches "101" in a CSV. */
export function matchesPredicates(record: RawRecord, predicates: readonly FieldPredicate[]): boolean {
  return predicates.every((p) => (record[p.field] ?? "").trim() === p.expected.trim());
}

/** Field names of the predicates, for required-field checks. */
export function predicateFields(predicates: readonly FieldPredicate[]): string[] {
  return predicates.map((p) => p.field);
}
