/**
 * Schema mapper registry, keyed by source id.
 */

import { callMapper } from "./call.js";
import { edetailMapper } from "./edetail.js";
import { eventsMapper } from "./events.js";
import { reachMapper } from "./reach.js";
import type { SchemaMapper } from "./base.js";
import type { SourceId } from "../../shared/types.js";

export const SCHEMA_MAPPERS: Readonly<Record<SourceId, SchemaMapper>> = {
  call: callMapper,
  edetail: edetailMapper,
  events: eventsMapper,
  reach: reachMapper,
};

export function getSchemaMapper(source: SourceId): SchemaMapper {
  return SCHEMA_MAPPERS[source];
}

export type { SchemaMapper } from "./base.js";
