/**
 * Schema Mapper contract and the mapping loop every source shares.
 *
 * Per record: exact-match predicates → field extraction → empty-value
 * check → date parsing. Only a missing source-wide field is fatal; every
 * other problem drops the one record and is reported in `dropped`.
 */

import { DateFormatError, SchemaMappingError } from "../../shared/errors.js";
import { buildEngagement } from "../canonical_schemas.js";
import { parseDate } from "../dates.js";
import { matchesPredicates, predicateFields } from "../filters.js";
import type {
  CalendarDate,
  CanonicalEngagement,
  DropReason,
  DroppedRecord,
  MappingResult,
  RawRecord,
  SourceFilterConfig,
  SourceId,
} from "../../shared/types.js";

export interface SchemaMapper {
  readonly source: SourceId;
  /** Raw fields the source must carry, as header columns or in some record. */
  readonly requiredFields: readonly string[];
  /** `columns` is the table's header row when the reader knows it. */
  map(
    records: readonly RawRecord[],
    filter: SourceFilterConfig,
    columns?: readonly string[] | null,
  ): MappingResult;
  /** Applied to the records that survived the retention window. */
  finalize?(records: CanonicalEngagement[]): MappingResult;
}

/** Source-specific values pulled out of one raw record. */
export interface ExtractedFields {
  hcpId: string;
  rawDate: string;
  id: string;
  channel: string;
  action: string;
}

export type Extraction =
  | { ok: true; fields: ExtractedFields }
  | { ok: false; reason: DropReason; detail: string };

export interface MappedRow {
  /** Position of the raw record in the source */
  index: number;
  record: CanonicalEngagement;
}

export interface SchemaMapperDefinition {
  source: SourceId;
  requiredFields: readonly string[];
  extract(record: RawRecord): Extraction;
  /** Orders the mapped rows, and may drop some. Source order when absent. */
  arrange?(rows: MappedRow[]): MappingResult;
  finalize?(records: CanonicalEngagement[]): MappingResult;
}

/** Read a raw field as a trimmed string ("" when absent). */
export function field(record: RawRecord, name: string): string {
  return (record[name] ?? "").trim();
}

/**
 * Checks the header when `columns` is known; otherwise the records, where
 * an empty source has nothing to check.
 * @throws SchemaMappingError when a required field (or a predicate field)
 * is absent from the whole source
 */
export function assertRequiredFields(
  mapper: Pick<SchemaMapper, "source" | "requiredFields">,
  filter: SourceFilterConfig,
  records: readonly RawRecord[],
  columns?: readonly string[] | null,
): void {
  const wanted = [...new Set([...mapper.requiredFields, ...predicateFields(filter.predicates)])];
  let missing: string[];
  if (columns) {
    missing = wanted.filter((name) => !columns.includes(name));
  } else if (records.length > 0) {
    missing = wanted.filter((name) => !records.some((r) => Object.hasOwn(r, name)));
  } else {
    return;
  }
  if (missing.length > 0) {
    throw new SchemaMappingError(mapper.source, missing);
  }
}

function tryParseDate(raw: string): CalendarDate | DateFormatError {
  try {
    return parseDate(raw);
  } catch (err) {
    if (err instanceof DateFormatError) return err;
    throw err;
  }
}

/**
 * Run the shared mapping loop, keeping each surviving row's source index.
 */
function mapRows(
  records: readonly RawRecord[],
  filter: SourceFilterConfig,
  extract: (record: RawRecord) => Extraction,
): { rows: MappedRow[]; dropped: DroppedRecord[] } {
  const rows: MappedRow[] = [];
  const dropped: DroppedRecord[] = [];

  records.forEach((raw, index) => {
    if (!matchesPredicates(raw, filter.predicates)) {
      dropped.push({ index, reason: "predicate_mismatch", detail: "filter predicate not met" });
      return;
    }

    const extraction = extract(raw);
    if (!extraction.ok) {
      dropped.push({ index, reason: extraction.reason, detail: extraction.detail });
      return;
    }

    const { hcpId, rawDate, id, channel, action } = extraction.fields;
    const empty = Object.entries({ hcp_id: hcpId, id, channel, action })
      .filter(([, v]) => v === "")
      .map(([k]) => k);
    if (empty.length > 0) {
      dropped.push({ index, reason: "empty_field", detail: `empty ${empty.join(", ")}` });
      return;
    }

    const date = tryParseDate(rawDate);
    if (date instanceof DateFormatError) {
      dropped.push({ index, reason: "bad_date", detail: date.message });
      return;
    }

    rows.push({ index, record: buildEngagement({ hcpId, date, id, channel, action }) });
  });

  return { rows, dropped };
}

/**
 * Build a SchemaMapper from a source's field extraction and its optional
 * ordering and post-retention steps.
 */
export function defineSchemaMapper(definition: SchemaMapperDefinition): SchemaMapper {
  const mapper: SchemaMapper = {
    source: definition.source,
    requiredFields: definition.requiredFields,
    finalize: definition.finalize,
    map(records, filter, columns) {
      assertRequiredFields(mapper, filter, records, columns);
      const mapped = mapRows(records, filter, definition.extract);
      const arranged = definition.arrange
        ? definition.arrange(mapped.rows)
        : { records: mapped.rows.map((r) => r.record), dropped: [] };
      return { records: arranged.records, dropped: [...mapped.dropped, ...arranged.dropped] };
    },
  };
  return mapper;
}
