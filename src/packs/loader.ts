/**
 * Source Loader: reads config files and raw source tables, and writes
 * canonical record sets as CSV.
 *
 * Raw tables may be CSV (header row) or JSON (an array of flat objects).
 * Every cell becomes a string so mappers see one RawRecord shape.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import path from "path";
import { parse } from "csv-parse/sync";
import { z } from "zod";

import { CANONICAL_COLUMNS, toRow } from "./canonical_schemas.js";
import { ConsolidateConfigSchema, SourceConfigSchema } from "./types.js";
import type { ConsolidateConfig, SourceConfig } from "./types.js";
import { ConfigurationError, SourceUnavailableError } from "../shared/errors.js";
import { sha256Bytes } from "../shared/hash.js";
import { configPathFor } from "../shared/run_config.js";
import { SOURCE_ORDER } from "../shared/types.js";
import type { CanonicalEngagement, RawRecord, RawTable, SourceId } from "../shared/types.js";

const CsvRowsSchema = z.array(z.record(z.string()));

const CsvHeaderSchema = z.array(z.string());

const JsonRowsSchema = z.array(
  z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])),
);

// ── Config Files ─────────────────────────────────────────────────────

function readConfigJson(configPath: string): unknown {
  if (!existsSync(configPath)) {
    throw new ConfigurationError(configPath, ["file not found"]);
  }
  try {
    return JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(configPath, [err instanceof Error ? err.message : String(err)]);
  }
}

function configIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
}

/**
 * Load and validate a per-source config file.
 */
export function loadSourceConfig(configPath: string): SourceConfig {
  const parsed = SourceConfigSchema.safeParse(readConfigJson(configPath));
  if (!parsed.success) {
    throw new ConfigurationError(configPath, configIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Load and validate the consolidation config file.
 */
export function loadConsolidateConfig(configPath: string): ConsolidateConfig {
  const parsed = ConsolidateConfigSchema.safeParse(readConfigJson(configPath));
  if (!parsed.success) {
    throw new ConfigurationError(configPath, configIssues(parsed.error));
  }
  return parsed.data;
}

// ── Raw Tables ───────────────────────────────────────────────────────

function readCsvTable(content: string): RawTable {
  const header: { columns: string[] | null } = { columns: null };
  const records: unknown = parse(content, {
    columns: (row: unknown) => {
      header.columns = CsvHeaderSchema.parse(row);
      return header.columns;
    },
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
    bom: true,
  });
  return { columns: header.columns, records: CsvRowsSchema.parse(records) };
}

function readJsonTable(content: string): RawTable {
  const rows = JsonRowsSchema.parse(JSON.parse(content));
  const records: RawRecord[] = rows.map((row) =>
    Object.fromEntries(Object.entries(row).map(([k, v]) => [k, v === null ? "" : String(v)])),
  );
  return { columns: null, records };
}

function readText(filePath: string, source?: SourceId): string {
  try {
    return readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new SourceUnavailableError(filePath, err instanceof Error ? err.message : String(err), source);
  }
}

/**
 * Read a raw source table (.csv or .json). CSV tables report their header
 * even when no rows follow it.
 * @throws SourceUnavailableError when the file is missing, unreadable or malformed
 */
export function readTable(filePath: string, source?: SourceId): RawTable {
  if (!existsSync(filePath)) {
    throw new SourceUnavailableError(filePath, "file not found", source);
  }
  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".csv" && ext !== ".json") {
    throw new SourceUnavailableError(filePath, `unsupported table format "${ext || "(none)"}"`, source);
  }

  const content = readText(filePath, source);
  try {
    return ext === ".csv" ? readCsvTable(content) : readJsonTable(content);
  } catch (err) {
    const reason = err instanceof z.ZodError ? "expected an array of flat rows" : err instanceof Error ? err.message : String(err);
    throw new SourceUnavailableError(filePath, reason, source);
  }
}

// ── Canonical Output ─────────────────────────────────────────────────

function csvCell(val: string): string {
  // Quote values containing commas, quotes, or newlines
  if (val.includes(",") || val.includes('"') || val.includes("\n") || val.includes("\r")) {
    return `"${val.replace(/"/g, '""')}"`;
  }
  return val;
}

/**
 * Serialize canonical records as CSV. The header row is always present.
 */
export function toCanonicalCsv(records: readonly CanonicalEngagement[]): string {
  const lines = [
    CANONICAL_COLUMNS.join(","),
    ...records.map((r) => toRow(r).map(csvCell).join(",")),
  ];
  return lines.join("\n") + "\n";
}

/**
 * Write canonical records to a CSV file, creating parent directories.
 * Returns the SHA-256 of the bytes written.
 */
export function writeCanonicalCsv(filePath: string, records: readonly CanonicalEngagement[]): string {
  mkdirSync(path.dirname(filePath), { recursive: true });
  const buffer = Buffer.from(toCanonicalCsv(records), "utf-8");
  writeFileSync(filePath, buffer);
  return sha256Bytes(buffer);
}

// ── Input Presence ───────────────────────────────────────────────────

export interface SourceInputStatus {
  source: SourceId;
  configPath: string;
  inputPath: string | null;
  exists: boolean;
  error?: string;
}

/**
 * Report whether each source's configured input file exists.
 * Paths in config files resolve against `rootDir`.
 */
export function checkSourceInputs(rootDir: string, configDir: string): SourceInputStatus[] {
  return SOURCE_ORDER.map((source) => {
    const configPath = configPathFor({ configDir }, source);
    try {
      const config = loadSourceConfig(configPath);
      const inputPath = path.resolve(rootDir, config.source.path);
      return { source, configPath, inputPath, exists: existsSync(inputPath) };
    } catch (err) {
      return {
        source,
        configPath,
        inputPath: null,
        exists: false,
        error: err instanceof Error ? err.message : String(err),
      };
    }
  });
}
