/**
 * Ranking Layout
 *
 * A RankingModel is the read-only part of a chart (options, table and
 * categorized pools) and is shared by every session. A RankingLayout holds one
 * session's mutable state: display sets, last search, viewport and the current
 * line collections.
 */

import { buildCategories } from "./categorize"
import { buildDisplaySets, injectSearchedRegion } from "./display"
import { buildLegend } from "./legend"
import { buildPlotData } from "./plot-data"
import type { RankingOptions } from "./config"
import type {
  Category,
  DisplayBindings,
  LayoutSnapshot,
  LegendEntry,
  LineEntry,
  Range,
  RegionEntry,
  RegionTable,
  TooltipRow,
} from "./types"

export interface RankingModel {
  options: RankingOptions
  table: RegionTable
  categories: Category[]
}

export function createRankingModel(table: RegionTable, options: RankingOptions): RankingModel {
  return { options, table, categories: buildCategories(table, options) }
}

export function buildTooltips(model: RankingModel): TooltipRow[] {
  const { strings } = model.options
  const { columns } = model.table

  const rows: TooltipRow[] = [{ label: strings.regionNameTooltip, field: "regionName" }]
  if (columns.has("postcode")) rows.push({ label: strings.regionCodeTooltip, field: "postcode" })
  rows.push({ label: strings.categoryTooltip, field: "category" })
  rows.push({ label: strings.timeSafeTooltip, field: "timeSafe" })
  rows.push({ label: strings.primaryIncidenceTooltip, field: "primaryIncidence" })
  if (columns.has("secondaryIncidence")) {
    rows.push({ label: strings.secondaryIncidenceTooltip, field: "secondaryIncidence" })
  }
  if (columns.has("percentChange")) rows.push({ label: strings.percentChangeTooltip, field: "percentChange" })
  return rows
}

/** Region names, then every real postcode ("0" marks a missing one) */
export function buildCompletions(table: RegionTable): string[] {
  const completions = table.entries.map((entry) => entry.regionName)
  for (const entry of table.entries) {
    if (entry.postcode !== null && entry.postcode !== "0") completions.push(entry.postcode)
  }
  return completions
}

export function buildBindings(model: RankingModel): DisplayBindings {
  const { options } = model
  return {
    title: options.title,
    lastUpdatedText: options.strings.lastUpdatedText,
    lastUpdatedTime: options.strings.lastUpdatedTime,
    legendTitle: options.strings.legendTitle,
    labels: options.labels,
    descriptions: options.descriptions,
    colors: options.colors,
    searchbarPlaceholder: options.strings.searchbarPlaceholder,
    resetButtonText: options.strings.resetButtonText,
    regionType: options.regionType,
    fontSize: options.fontSize,
    aspectRatio: options.aspectRatio,
    completions: buildCompletions(model.table),
    tooltips: buildTooltips(model),
  }
}

export class RankingLayout {
  private displaySets: RegionEntry[][]
  private lastSearched = ""
  private yRange: Range
  private lines: LineEntry[] = []
  private highlighted: LineEntry[] = []
  private readonly legend: Array<LegendEntry | null>
  private readonly bindings: DisplayBindings

  constructor(private readonly model: RankingModel) {
    const { options } = model
    this.yRange = [options.yRange[0], options.yRange[1]]
    this.displaySets = this.initialDisplaySets()
    this.rebuild()

    const legend = buildLegend(model.categories, options.minSpaceY, options.minSpaceX, this.yRange)
    this.legend = legend.legend
    this.yRange = legend.yRange
    this.bindings = buildBindings(model)
  }

  /**
   * Highlight a region by name or postcode, adding it to the chart if it isn't
   * already shown. An empty query resets.
   */
  search(query: string): LayoutSnapshot {
    if (query === "") return this.reset()

    this.lastSearched = query
    injectSearchedRegion(this.model.categories, this.displaySets, query)
    this.rebuild()
    return this.snapshot()
  }

  /** Drop any searched region and return to the default selection */
  reset(): LayoutSnapshot {
    this.lastSearched = ""
    this.displaySets = this.initialDisplaySets()
    this.rebuild()
    return this.snapshot()
  }

  getDisplaySets(): RegionEntry[][] {
    return this.displaySets.map((set) => [...set])
  }

  getLastSearched(): string {
    return this.lastSearched
  }

  snapshot(): LayoutSnapshot {
    return {
      lines: this.lines,
      highlighted: this.highlighted,
      legend: this.legend,
      xRange: this.model.options.xRange,
      yRange: this.yRange,
      lastSearched: this.lastSearched,
      bindings: this.bindings,
    }
  }

  private initialDisplaySets(): RegionEntry[][] {
    const { totalDisplayRegions, minDisplayRegions } = this.model.options
    return buildDisplaySets(this.model.categories, totalDisplayRegions, minDisplayRegions)
  }

  private rebuild() {
    const { minSpaceX, minSpaceY } = this.model.options
    const plot = buildPlotData(
      this.model.categories,
      this.displaySets,
      { minSpaceX, minSpaceY },
      this.lastSearched,
      this.yRange,
    )
    this.lines = plot.lines
    this.highlighted = plot.highlighted
    this.yRange = plot.yRange
  }
}
