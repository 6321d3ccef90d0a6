import { RankingError } from "./errors"
import type { ColumnKeys, RankingOptions } from "./config"
import type { Category, NumericField, RegionEntry, RegionTable, SortCriterion } from "./types"

/**
 * Read a numeric field from an entry. Optional columns are validated up front,
 * so a null here means the column was never loaded.
 */
export function fieldValue(entry: RegionEntry, field: NumericField): number {
  const value = entry[field]
  if (value === null) {
    throw new RankingError("MISSING_COLUMN", `Region "${entry.regionName}" has no value for ${field}`, { field })
  }
  return value
}

/**
 * Full bound list: the configured lower bounds plus max(primary incidence) + 1.
 */
export function resolveBounds(lowerBounds: number[], entries: RegionEntry[]): number[] {
  if (lowerBounds.length === 0) {
    throw new RankingError("NO_CATEGORIES", "At least one category is required")
  }
  for (let i = 0; i < lowerBounds.length; i++) {
    if (!Number.isFinite(lowerBounds[i])) {
      throw new RankingError("INVALID_BOUNDS", `Lower bound ${i} is not a finite number`, { lowerBounds })
    }
    if (i > 0 && lowerBounds[i] < lowerBounds[i - 1]) {
      throw new RankingError(
        "INVALID_BOUNDS",
        `Lower bounds must be non-decreasing (bound ${i} = ${lowerBounds[i]} < ${lowerBounds[i - 1]})`,
        { lowerBounds },
      )
    }
  }

  let max = -Infinity
  for (const entry of entries) {
    if (entry.primaryIncidence > max) max = entry.primaryIncidence
  }

  return [...lowerBounds, max + 1]
}

/**
 * Membership test for one category. The equality clause lets a zero-width
 * category (lower == upper) still capture values exactly on its bound.
 */
export function inCategory(value: number, lower: number, upper: number): boolean {
  return value >= lower && (value < upper || (lower === upper && value === upper))
}

/**
 * Partition entries into pools, then make them disjoint from the last category
 * back to the second: a row in both pool i and pool i-1 stays only in i-1.
 */
export function partitionEntries(entries: RegionEntry[], bounds: number[], incidenceFields: NumericField[]): RegionEntry[][] {
  const pools = incidenceFields.map((field, i) =>
    entries.filter((entry) => inCategory(fieldValue(entry, field), bounds[i], bounds[i + 1])),
  )

  for (let i = pools.length - 1; i >= 1; i--) {
    const better = new Set(pools[i - 1].map((entry) => entry.index))
    pools[i] = pools[i].filter((entry) => !better.has(entry.index))
  }

  return pools
}

export function sortCriterionFor(index: number, incidenceField: NumericField, options: RankingOptions): SortCriterion {
  if (index === 0) {
    return { field: "timeSafe", ascending: false, unit: options.timeSafeUnit }
  }
  return { field: incidenceField, ascending: true, unit: options.incidenceUnit }
}

function requireColumn(table: RegionTable, field: NumericField, category: string, keys: ColumnKeys) {
  if (field === "primaryIncidence") return
  if (!table.columns.has(field)) {
    throw new RankingError("MISSING_COLUMN", `Category "${category}" needs the "${keys[field]}" column`, {
      field,
      category,
    })
  }
}

/**
 * Build one Category record per configured label: bounds, pool, ratio and
 * sort criterion.
 */
export function buildCategories(table: RegionTable, options: RankingOptions): Category[] {
  const { entries } = table
  const n = options.labels.length
  if (n === 0) {
    throw new RankingError("NO_CATEGORIES", "At least one category is required")
  }
  if (entries.length === 0) {
    throw new RankingError("EMPTY_TABLE", "Input table has no rows")
  }
  for (const [name, values] of Object.entries({
    descriptions: options.descriptions,
    lowerBounds: options.lowerBounds,
    colors: options.colors,
    calcWithSecondaryIncidence: options.calcWithSecondaryIncidence,
  })) {
    if (values.length !== n) {
      throw new RankingError("INVALID_CONFIG", `Expected ${n} ${name}, got ${values.length}`)
    }
  }

  const bounds = resolveBounds(options.lowerBounds, entries)
  const incidenceFields: NumericField[] = options.calcWithSecondaryIncidence.map((secondary) =>
    secondary ? "secondaryIncidence" : "primaryIncidence",
  )
  incidenceFields.forEach((field, i) =>
    requireColumn(table, field, options.labels[i], options.keys),
  )

  const pools = partitionEntries(entries, bounds, incidenceFields)

  return pools.map((pool, i) => {
    const sort = sortCriterionFor(i, incidenceFields[i], options)
    if (pool.length > 0) {
      requireColumn(table, sort.field, options.labels[i], options.keys)
    }

    return {
      index: i,
      label: options.labels[i],
      description: options.descriptions[i],
      color: options.colors[i],
      lowerBound: bounds[i],
      upperBound: bounds[i + 1],
      incidenceField: incidenceFields[i],
      sort,
      pool,
      ratio: pool.length / entries.length,
    }
  })
}
