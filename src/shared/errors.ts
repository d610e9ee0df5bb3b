/**
 * Pipeline error kinds.
 *
 * Record-level problems (a bad date) are recovered inside a mapper; every
 * other kind is source-fatal and stops the run at the failing task.
 */

import type { SourceId } from "./types.js";

export type PipelineErrorCode =
  | "SOURCE_UNAVAILABLE"
  | "DATE_FORMAT"
  | "SCHEMA_MAPPING"
  | "INCOMPLETE_SOURCE"
  | "CONFIGURATION";

/**
 * Base class for all pipeline errors.
 */
export class PipelineError extends Error {
  /** Error code for programmatic handling */
  public readonly code: PipelineErrorCode;

  /** Source the error belongs to, when it belongs to one */
  public readonly source?: SourceId;

  /** Additional error context */
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: PipelineErrorCode,
    source?: SourceId,
    context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "PipelineError";
    this.code = code;
    this.source = source;
    this.context = context;
  }
}

/** Raw data could not be obtained (missing file, unsupported format). */
export class SourceUnavailableError extends PipelineError {
  public readonly path: string;

  constructor(path: string, reason: string, source?: SourceId) {
    super(`Source data unavailable at ${path}: ${reason}`, "SOURCE_UNAVAILABLE", source, { path });
    this.name = "SourceUnavailableError";
    this.path = path;
  }
}

/** A single date value matched none of the accepted formats. */
export class DateFormatError extends PipelineError {
  public readonly rawValue: string;

  constructor(rawValue: string) {
    super(`Unrecognized date value "${rawValue}"`, "DATE_FORMAT", undefined, { rawValue });
    this.name = "DateFormatError";
    this.rawValue = rawValue;
  }
}

/** A required raw field is absent from the whole source. */
export class SchemaMappingError extends PipelineError {
  public readonly missingFields: string[];

  constructor(source: SourceId, missingFields: string[]) {
    super(
      `Required field(s) missing from ${source} source: ${missingFields.join(", ")}`,
      "SCHEMA_MAPPING",
      source,
      { missingFields },
    );
    this.name = "SchemaMappingError";
    this.missingFields = missingFields;
  }
}

/** The consolidator was asked to merge before every source completed. */
export class IncompleteSourceError extends PipelineError {
  public readonly missingSources: SourceId[];

  constructor(missingSources: SourceId[]) {
    super(
      `Cannot consolidate: no output from ${missingSources.join(", ")}`,
      "INCOMPLETE_SOURCE",
      undefined,
      { missingSources },
    );
    this.name = "IncompleteSourceError";
    this.missingSources = missingSources;
  }
}

/** A configuration file is missing or does not match its schema. */
export class ConfigurationError extends PipelineError {
  constructor(configPath: string, issues: string[]) {
    super(`Invalid configuration ${configPath}: ${issues.join("; ")}`, "CONFIGURATION", undefined, {
      configPath,
      issues,
    });
    this.name = "ConfigurationError";
  }
}

/** Short "<Name>: <message>" form used in log lines. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}
