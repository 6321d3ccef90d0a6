import { fieldValue } from "./categorize"
import type { Category, RegionEntry, SortCriterion } from "./types"

/**
 * Stable sort by a category's criterion; equal keys keep their current order.
 */
export function sortEntries(entries: RegionEntry[], sort: SortCriterion): RegionEntry[] {
  const direction = sort.ascending ? 1 : -1
  return [...entries].sort((a, b) => (fieldValue(a, sort.field) - fieldValue(b, sort.field)) * direction)
}

export function displayCount(category: Category, totalDisplayRegions: number, minDisplayRegions: number): number {
  const wanted = Math.max(Math.floor(totalDisplayRegions * category.ratio), minDisplayRegions)
  return Math.min(wanted, category.pool.length)
}

/**
 * Best-ranked head of the pool, with its last slot given to the pool's worst
 * row whenever the pool doesn't fit.
 */
export function selectDisplayRegions(category: Category, totalDisplayRegions: number, minDisplayRegions: number): RegionEntry[] {
  const count = displayCount(category, totalDisplayRegions, minDisplayRegions)
  const sorted = sortEntries(category.pool, category.sort)
  const head = sorted.slice(0, count)

  if (sorted.length > count && head.length > 0) {
    head[head.length - 1] = sorted[sorted.length - 1]
  }
  return head
}

export function buildDisplaySets(categories: Category[], totalDisplayRegions: number, minDisplayRegions: number): RegionEntry[][] {
  return categories.map((category) => selectDisplayRegions(category, totalDisplayRegions, minDisplayRegions))
}

/** All-digit queries are postcodes; anything else is a region name */
export function isPostcodeQuery(query: string): boolean {
  return /^\d+$/.test(query)
}

export function matchesQuery(entry: RegionEntry, query: string): boolean {
  return isPostcodeQuery(query) ? entry.postcode === query : entry.regionName === query
}

/**
 * Add the searched region to its category's display set and re-sort that set.
 *
 * Returns the index of the category that changed, or null when nothing matched
 * or the match was already on display. `displaySets` is updated in place.
 */
export function injectSearchedRegion(categories: Category[], displaySets: RegionEntry[][], query: string): number | null {
  if (query === "") return null

  for (const category of categories) {
    const match = category.pool.find((entry) => matchesQuery(entry, query))
    if (!match) continue

    const displayed = displaySets[category.index]
    if (displayed.some((entry) => matchesQuery(entry, query))) continue

    displaySets[category.index] = sortEntries([...displayed, match], category.sort)
    return category.index
  }
  return null
}
