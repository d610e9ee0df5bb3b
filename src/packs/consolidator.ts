/**
 * Consolidator: concatenates per-source canonical record sets into one
 * unified dataset in the fixed order call → edetail → events → reach.
 * No sorting, no deduplication.
 */

import { IncompleteSourceError } from "../shared/errors.js";
import { SOURCE_ORDER } from "../shared/types.js";
import type { CanonicalEngagement, SourceId, UnifiedDataset } from "../shared/types.js";

/**
 * A source that ran and produced no rows is passed as an empty array.
 * A source that never completed is absent from `parts`.
 * @throws IncompleteSourceError listing every absent source
 */
export function consolidate(
  parts: Partial<Record<SourceId, readonly CanonicalEngagement[]>>,
): UnifiedDataset {
  const missing = SOURCE_ORDER.filter((s) => parts[s] === undefined);
  if (missing.length > 0) {
    throw new IncompleteSourceError(missing);
  }

  const records: CanonicalEngagement[] = [];
  const sourceCounts: Record<SourceId, number> = { call: 0, edetail: 0, events: 0, reach: 0 };
  for (const source of SOURCE_ORDER) {
    const part = parts[source] ?? [];
    sourceCounts[source] = part.length;
    for (const record of part) {
      records.push(Object.freeze({ ...record }));
    }
  }

  return Object.freeze({
    records: Object.freeze(records),
    sourceCounts: Object.freeze(sourceCounts),
  });
}
