import { parseVisualizationConfig, type RankingOptions } from "@/lib/ranking/config"
import { createRankingModel, type RankingModel } from "@/lib/ranking/layout"
import { parseRegionTable } from "@/lib/ranking/table"
import type { Category, RegionEntry, RegionTable } from "@/lib/ranking/types"

export const SAMPLE_CSV = `Region,Postcode,Cases 14d,Cases 7d,Case-Free Days,Pct Change
Ashford Vale,2101,0,0,41,0
Birch Hollow,2102,0,0,12,0
Cedar Point,2103,0,0,27,0
Dunmore,2104,0,0,3,0
Elm Crossing,2105,0,0,66,0
Fernleigh,2106,0,0,8,0
Glenrock,2107,2,1,0,-50
Harbour Flats,2108,5,3,0,50
Ironbridge,2109,1,1,0,0
Juniper Bay,2110,14,6,0,-25
Kingsmoor,2111,9,5,0,25
Larkspur,2112,18,10,0,11.1
Millbrook,2113,22,12,0,20
Northgate,2114,45,20,0,-20
Oakhurst,2115,31,18,0,38.5
Pinecrest,2116,87,40,0,-15.3
`

export const SAMPLE_CONFIG = {
  title: "District Case Rankings",
  labels: ["Green Zone", "Low Incidence", "High Incidence"],
  descriptions: ["No new cases", "A few new cases", "Many new cases"],
  lower_bounds: [0, 1, 20],
  colors: ["#4caf50", "#ffc107", "#f44336"],
  region_key: "Region",
  primary_incidence_key: "Cases 14d",
  secondary_incidence_key: "Cases 7d",
  time_safe_key: "Case-Free Days",
  postcode_key: "Postcode",
  percent_change_key: "Pct Change",
}

export function sampleOptions(overrides: Record<string, unknown> = {}): RankingOptions {
  return parseVisualizationConfig({ ...SAMPLE_CONFIG, ...overrides })
}

export function sampleModel(overrides: Record<string, unknown> = {}): RankingModel {
  const options = sampleOptions(overrides)
  return createRankingModel(parseRegionTable(SAMPLE_CSV, options.keys), options)
}

export function entry(index: number, regionName: string, primaryIncidence: number, extra: Partial<RegionEntry> = {}): RegionEntry {
  return {
    index,
    regionName,
    postcode: null,
    primaryIncidence,
    secondaryIncidence: null,
    timeSafe: 0,
    percentChange: null,
    ...extra,
  }
}

export function tableOf(entries: RegionEntry[], columns: RegionTable["columns"] = new Set(["timeSafe"])): RegionTable {
  return { entries, columns }
}

export function category(index: number, ratio: number, extra: Partial<Category> = {}): Category {
  return {
    index,
    label: `Category ${index}`,
    description: "",
    color: `#00000${index}`,
    lowerBound: 0,
    upperBound: 1,
    incidenceField: "primaryIncidence",
    sort: { field: "primaryIncidence", ascending: true, unit: { singular: "case", plural: "cases" } },
    pool: [],
    ratio,
    ...extra,
  }
}

export function names(entries: RegionEntry[]): string[] {
  return entries.map((e) => e.regionName)
}
