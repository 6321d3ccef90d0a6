/**
 * Plot Data Builder
 *
 * Turns each category's display set into labelled polylines. Categories stack
 * downward from y = 1, each taking a band as tall as its ratio. Inside a band,
 * rows are spread by their sort value with 10% padding top and bottom, and a
 * label that would crowd the one above it is pushed down onto a branch.
 */

import { adjustBranches } from "./branches"
import { fieldValue } from "./categorize"
import { formatPercentChange, formatRegionLabel } from "./format"
import type { Category, LineEntry, Range, RegionEntry } from "./types"

/** Where region lines leave the category box */
export const LINE_X0 = 1
/** Horizontal length of each polyline segment */
export const BRANCH_STEP = 0.25
export const BAND_PADDING = 0.1

export interface PlotSettings {
  minSpaceX: number
  minSpaceY: number
}

export interface PlotData {
  lines: LineEntry[]
  highlighted: LineEntry[]
  yRange: Range
}

/**
 * Grow the viewport downward so `y` is visible, keeping the same padding
 * below it as there is above y = 1. Returns `range` itself when `y` already fits.
 */
export function expandYRange(range: Range, y: number): Range {
  if (y < range[0]) {
    return [y - (range[1] - 1), range[1]]
  }
  return range
}

/** Normalize a value against the display set's extent; 0.5 when they're all equal */
export function relativePosition(value: number, min: number, max: number): number {
  return max === min ? 0.5 : (value - min) / (max - min)
}

/**
 * Line height for a value within a band. The first row of the display set
 * lands at the top: the minimum for ascending criteria, the maximum for
 * descending ones.
 */
export function bandY(relative: number, bandTop: number, bandHeight: number, ascending: boolean): number {
  const padding = bandHeight * BAND_PADDING
  const offset = ascending ? relative : 1 - relative
  return bandTop - (bandHeight - padding * 2) * offset - padding
}

export function toLineEntry(entry: RegionEntry, category: Category, lineY: number, textY: number): LineEntry {
  const value = fieldValue(entry, category.sort.field)
  const lineX: LineEntry["lineX"] = [LINE_X0, LINE_X0 + BRANCH_STEP, LINE_X0 + BRANCH_STEP, LINE_X0 + BRANCH_STEP * 2]

  return {
    lineX,
    lineY: [lineY, lineY, textY, textY],
    lineColor: category.color,
    textX: lineX[3],
    textY,
    text: formatRegionLabel(entry.regionName, value, category.sort.unit),
    regionName: entry.regionName,
    category: category.label,
    postcode: entry.postcode,
    timeSafe: entry.timeSafe,
    primaryIncidence: entry.primaryIncidence,
    secondaryIncidence: entry.secondaryIncidence,
    percentChange: formatPercentChange(entry.percentChange),
  }
}

/**
 * Remove the last entry matching the query (by region name or postcode) and
 * return it. Mutates `lines`.
 */
export function extractSearched(lines: LineEntry[], query: string): LineEntry[] {
  if (query === "") return []

  for (let i = lines.length - 1; i >= 0; i--) {
    if (lines[i].regionName === query || lines[i].postcode === query) {
      return lines.splice(i, 1)
    }
  }
  return []
}

export function buildPlotData(
  categories: Category[],
  displaySets: RegionEntry[][],
  settings: PlotSettings,
  query: string,
  yRange: Range,
): PlotData {
  const lines: LineEntry[] = []
  let range = yRange
  let bandTop = 1
  let lastTextY = Infinity

  for (const category of categories) {
    const bandHeight = category.ratio
    if (bandHeight === 0) continue

    const displayed = displaySets[category.index]
    const values = displayed.map((entry) => fieldValue(entry, category.sort.field))
    const min = Math.min(...values)
    const max = Math.max(...values)

    displayed.forEach((entry, i) => {
      const lineY = bandY(relativePosition(values[i], min, max), bandTop, bandHeight, category.sort.ascending)

      let textY = lineY
      if (lastTextY - lineY < settings.minSpaceY) {
        textY = lastTextY - settings.minSpaceY
      }
      lastTextY = textY
      range = expandYRange(range, textY)

      lines.push(toLineEntry(entry, category, lineY, textY))
    })

    bandTop -= bandHeight
  }

  adjustBranches(lines, "right", settings.minSpaceX)
  const highlighted = extractSearched(lines, query)

  return { lines, highlighted, yRange: range }
}
