/**
 * Ranking Chart Types
 *
 * Core type definitions for the categorized ranking chart: input rows,
 * categories, rendered line/legend entries and the per-session snapshot.
 */

/** Numeric fields a category can be bounded or sorted by */
export type NumericField = "primaryIncidence" | "secondaryIncidence" | "timeSafe"

/** Optional columns of the input table */
export type OptionalColumn = "postcode" | "secondaryIncidence" | "timeSafe" | "percentChange"

/** One row of the input table */
export interface RegionEntry {
  /** Position in the input table (0-based); identity and tie-break order */
  index: number
  regionName: string
  postcode: string | null
  primaryIncidence: number
  secondaryIncidence: number | null
  /** Days (or other unit) since the region was last affected */
  timeSafe: number | null
  /** Percent change in incidence, e.g. 12.5 for +12.5% */
  percentChange: number | null
}

export interface RegionTable {
  entries: RegionEntry[]
  /** Optional columns present in the source file */
  columns: ReadonlySet<OptionalColumn>
}

export interface Unit {
  singular: string
  plural: string
}

export interface SortCriterion {
  field: NumericField
  ascending: boolean
  unit: Unit
}

/** A severity category with all of its derived per-category data */
export interface Category {
  index: number
  label: string
  description: string
  color: string
  /** Inclusive */
  lowerBound: number
  /** Exclusive, except for zero-width categories */
  upperBound: number
  /** Field used for the bound comparisons */
  incidenceField: NumericField
  sort: SortCriterion
  /** Entries in input order */
  pool: RegionEntry[]
  /** Share of all input rows, 0..1 */
  ratio: number
}

export type Range = [number, number]

/** A rendered region label and its connecting polyline */
export interface LineEntry {
  lineX: [number, number, number, number]
  lineY: [number, number, number, number]
  lineColor: string
  textX: number
  textY: number
  text: string
  regionName: string
  category: string
  postcode: string | null
  timeSafe: number | null
  primaryIncidence: number
  secondaryIncidence: number | null
  /** Formatted, e.g. "12.5%" */
  percentChange: string | null
}

/** A category box in the legend column */
export interface LegendEntry {
  boxTopY: number
  boxBottomY: number
  color: string
  textX: number
  textY: number
  text: string
  /** Present when the label sits beside the box instead of inside it */
  lineX: [number, number, number, number] | null
  lineY: [number, number, number, number] | null
}

/** Anything the branch resolver can shift */
export interface Branchable {
  lineX: number[] | null
  lineY: number[] | null
  textX: number
}

export type BranchDirection = "left" | "right"

export type TooltipField =
  | "regionName"
  | "postcode"
  | "category"
  | "timeSafe"
  | "primaryIncidence"
  | "secondaryIncidence"
  | "percentChange"

export interface TooltipRow {
  label: string
  field: TooltipField
}

/** Strings and settings the presentation layer needs alongside the geometry */
export interface DisplayBindings {
  title: string
  lastUpdatedText: string
  lastUpdatedTime: string | null
  legendTitle: string
  labels: string[]
  descriptions: string[]
  colors: string[]
  searchbarPlaceholder: string
  resetButtonText: string
  regionType: string
  fontSize: number
  aspectRatio: number
  completions: string[]
  tooltips: TooltipRow[]
}

export interface LayoutSnapshot {
  lines: LineEntry[]
  highlighted: LineEntry[]
  /** One element per category, null where the category is empty */
  legend: Array<LegendEntry | null>
  xRange: Range
  yRange: Range
  lastSearched: string
  bindings: DisplayBindings
}

/** Body of the ranking API responses */
export interface RankingResponse extends LayoutSnapshot {
  pageTitle: string
}
