import { parse } from "csv-parse/sync"
import { z } from "zod"
import { RankingError } from "./errors"
import type { ColumnKeys } from "./config"
import type { OptionalColumn, RegionEntry, RegionTable } from "./types"

const RecordsSchema = z.array(z.record(z.string()))

type Row = Record<string, string>

function parseNumber(row: Row, column: string, line: number): number {
  const raw = (row[column] ?? "").trim()
  const value = Number(raw)
  if (raw === "" || !Number.isFinite(value)) {
    throw new RankingError("INVALID_CELL", `Row ${line}: "${column}" must be a number, got "${raw}"`, { line, column })
  }
  return value
}

function parseOptionalNumber(row: Row, column: string, line: number, present: boolean, allowBlank: boolean) {
  if (!present) return null
  if (allowBlank && (row[column] ?? "").trim() === "") return null
  return parseNumber(row, column, line)
}

function parseOptionalString(row: Row, column: string, present: boolean): string | null {
  if (!present) return null
  const value = (row[column] ?? "").trim()
  return value === "" ? null : value
}

/**
 * Build a typed region table from already-parsed records.
 *
 * Region name and primary incidence are required columns. Time-safe and
 * secondary incidence may be missing entirely, but when present every row needs
 * a number since categories can bound or sort by them. Postcode and percent
 * change may also be blank per row.
 */
export function toRegionTable(records: Row[], keys: ColumnKeys): RegionTable {
  if (records.length === 0) {
    throw new RankingError("EMPTY_TABLE", "Input table has no rows")
  }

  const header = new Set(Object.keys(records[0]))
  for (const required of [keys.region, keys.primaryIncidence]) {
    if (!header.has(required)) {
      throw new RankingError("MISSING_COLUMN", `Input table is missing required column "${required}"`, {
        column: required,
      })
    }
  }

  const columns = new Set<OptionalColumn>()
  if (header.has(keys.postcode)) columns.add("postcode")
  if (header.has(keys.secondaryIncidence)) columns.add("secondaryIncidence")
  if (header.has(keys.timeSafe)) columns.add("timeSafe")
  if (header.has(keys.percentChange)) columns.add("percentChange")

  const entries: RegionEntry[] = records.map((row, index) => {
    // header is line 1
    const line = index + 2
    const regionName = (row[keys.region] ?? "").trim()
    if (regionName === "") {
      throw new RankingError("INVALID_CELL", `Row ${line}: "${keys.region}" is empty`, { line, column: keys.region })
    }

    return {
      index,
      regionName,
      postcode: parseOptionalString(row, keys.postcode, columns.has("postcode")),
      primaryIncidence: parseNumber(row, keys.primaryIncidence, line),
      secondaryIncidence: parseOptionalNumber(row, keys.secondaryIncidence, line, columns.has("secondaryIncidence"), false),
      timeSafe: parseOptionalNumber(row, keys.timeSafe, line, columns.has("timeSafe"), false),
      percentChange: parseOptionalNumber(row, keys.percentChange, line, columns.has("percentChange"), true),
    }
  })

  return { entries, columns }
}

/**
 * Parse CSV text (header row first) into a region table.
 */
export function parseRegionTable(content: string, keys: ColumnKeys): RegionTable {
  let records: unknown
  try {
    records = parse(content, {
      columns: true,
      skip_empty_lines: true,
      trim: true,
      bom: true,
    })
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new RankingError("INVALID_CELL", `Input table is not valid CSV: ${message}`, error)
  }

  return toRegionTable(RecordsSchema.parse(records), keys)
}
