/**
 * Ranking Chart Configuration
 *
 * The chart is configured by a JSON document using the snake_case keys below.
 * Only `title`, `labels`, `descriptions`, `lower_bounds` and `colors` are
 * required; everything else falls back to the defaults in this file.
 * Unknown keys are ignored.
 *
 * Example:
 * {
 *   "page_title": "Regional Rankings",
 *   "visualizations": [
 *     { "districts": { "title": "...", "labels": [...], ... } }
 *   ]
 * }
 */

import { z } from "zod"
import { RankingError } from "./errors"
import type { Range } from "./types"

// -----------------------------------------------------------------------------
// Defaults
// -----------------------------------------------------------------------------

export const DEFAULT_PAGE_TITLE = "Green Zone Visualizations"

export const SIZING_DEFAULTS: {
  aspect_ratio: number
  x_range: Range
  y_range: Range
  min_space_x: number
  min_space_y: number
  total_display_regions: number
  min_display_regions: number
  font_size: number
} = {
  aspect_ratio: 0.9,
  x_range: [-4, 7],
  y_range: [-0.075, 1.075],
  min_space_x: 0.09,
  min_space_y: 0.06,
  total_display_regions: 12,
  min_display_regions: 2,
  font_size: 16,
}

export const KEY_DEFAULTS = {
  region_key: "District/County Town",
  primary_incidence_key: "New Cases in Last 14 Days",
  secondary_incidence_key: "Last 7 Days",
  time_safe_key: "COVID-Free Days",
  postcode_key: "Postcode",
  percent_change_key: "Pct Change",
}

export const UNIT_DEFAULTS = {
  region_type: "Region",
  time_safe_unit: "day",
  time_safe_plural_unit: "days",
  incidence_unit: "case",
  incidence_plural_unit: "cases",
}

export const STRING_DEFAULTS = {
  last_updated_text: "Last updated",
  legend_title: "Legend",
  searchbar_placeholder: "Search for a region...",
  reset_button_text: "Reset",
  region_name_tooltip: "Region Name",
  category_tooltip: "Category",
  region_code_tooltip: "Region Code",
  time_safe_tooltip: "COVID-Free Days",
  primary_incidence_tooltip: "New Cases in Last 14 Days",
  secondary_incidence_tooltip: "New Cases in Last 7 Days",
  percent_change_tooltip: "Weekly Percent Change",
}

// -----------------------------------------------------------------------------
// Schema
// -----------------------------------------------------------------------------

const RangeSchema = z.tuple([z.number(), z.number()]).refine(([lo, hi]) => lo < hi, {
  message: "range lower bound must be below its upper bound",
})

const withDefault = (value: string) => z.string().default(value)

export const VisualizationConfigSchema = z
  .object({
    title: z.string(),
    labels: z.array(z.string()).min(1, "at least one category is required"),
    descriptions: z.array(z.string()),
    lower_bounds: z.array(z.number().finite()),
    colors: z.array(z.string()),

    aspect_ratio: z.number().positive().default(SIZING_DEFAULTS.aspect_ratio),
    x_range: RangeSchema.default(SIZING_DEFAULTS.x_range),
    y_range: RangeSchema.default(SIZING_DEFAULTS.y_range),
    min_space_x: z.number().nonnegative().default(SIZING_DEFAULTS.min_space_x),
    min_space_y: z.number().nonnegative().default(SIZING_DEFAULTS.min_space_y),
    total_display_regions: z.number().int().nonnegative().default(SIZING_DEFAULTS.total_display_regions),
    min_display_regions: z.number().int().nonnegative().default(SIZING_DEFAULTS.min_display_regions),
    font_size: z.number().positive().default(SIZING_DEFAULTS.font_size),

    region_key: withDefault(KEY_DEFAULTS.region_key),
    primary_incidence_key: withDefault(KEY_DEFAULTS.primary_incidence_key),
    secondary_incidence_key: withDefault(KEY_DEFAULTS.secondary_incidence_key),
    time_safe_key: withDefault(KEY_DEFAULTS.time_safe_key),
    postcode_key: withDefault(KEY_DEFAULTS.postcode_key),
    percent_change_key: withDefault(KEY_DEFAULTS.percent_change_key),

    region_type: withDefault(UNIT_DEFAULTS.region_type),
    time_safe_unit: withDefault(UNIT_DEFAULTS.time_safe_unit),
    time_safe_plural_unit: withDefault(UNIT_DEFAULTS.time_safe_plural_unit),
    incidence_unit: withDefault(UNIT_DEFAULTS.incidence_unit),
    incidence_plural_unit: withDefault(UNIT_DEFAULTS.incidence_plural_unit),
    // null entries count as false
    calc_with_secondary_incidence: z.array(z.boolean().nullable()).optional(),

    last_updated_text: withDefault(STRING_DEFAULTS.last_updated_text),
    legend_title: withDefault(STRING_DEFAULTS.legend_title),
    searchbar_placeholder: withDefault(STRING_DEFAULTS.searchbar_placeholder),
    reset_button_text: withDefault(STRING_DEFAULTS.reset_button_text),
    region_name_tooltip: withDefault(STRING_DEFAULTS.region_name_tooltip),
    category_tooltip: withDefault(STRING_DEFAULTS.category_tooltip),
    region_code_tooltip: withDefault(STRING_DEFAULTS.region_code_tooltip),
    time_safe_tooltip: withDefault(STRING_DEFAULTS.time_safe_tooltip),
    primary_incidence_tooltip: withDefault(STRING_DEFAULTS.primary_incidence_tooltip),
    secondary_incidence_tooltip: withDefault(STRING_DEFAULTS.secondary_incidence_tooltip),
    percent_change_tooltip: withDefault(STRING_DEFAULTS.percent_change_tooltip),
  })
  .superRefine((config, ctx) => {
    const n = config.labels.length
    const parallel = {
      descriptions: config.descriptions.length,
      lower_bounds: config.lower_bounds.length,
      colors: config.colors.length,
      calc_with_secondary_incidence: config.calc_with_secondary_incidence?.length ?? n,
    }
    for (const [key, length] of Object.entries(parallel)) {
      if (length !== n) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `expected ${n} entries (one per label), got ${length}`,
        })
      }
    }
  })

export type VisualizationConfig = z.infer<typeof VisualizationConfigSchema>

export const ConfigDocumentSchema = z.object({
  page_title: z.string().default(DEFAULT_PAGE_TITLE),
  visualizations: z.array(z.record(z.unknown())).min(1, "no visualizations configured"),
})

// -----------------------------------------------------------------------------
// Options
// -----------------------------------------------------------------------------

export interface ColumnKeys {
  region: string
  primaryIncidence: string
  secondaryIncidence: string
  timeSafe: string
  postcode: string
  percentChange: string
}

export interface RankingOptions {
  title: string
  labels: string[]
  descriptions: string[]
  lowerBounds: number[]
  colors: string[]
  calcWithSecondaryIncidence: boolean[]

  aspectRatio: number
  xRange: Range
  yRange: Range
  minSpaceX: number
  minSpaceY: number
  totalDisplayRegions: number
  minDisplayRegions: number
  fontSize: number

  keys: ColumnKeys

  regionType: string
  timeSafeUnit: { singular: string; plural: string }
  incidenceUnit: { singular: string; plural: string }

  strings: {
    lastUpdatedText: string
    lastUpdatedTime: string | null
    legendTitle: string
    searchbarPlaceholder: string
    resetButtonText: string
    regionNameTooltip: string
    categoryTooltip: string
    regionCodeTooltip: string
    timeSafeTooltip: string
    primaryIncidenceTooltip: string
    secondaryIncidenceTooltip: string
    percentChangeTooltip: string
  }
}

export function toRankingOptions(config: VisualizationConfig, lastUpdatedTime: string | null = null): RankingOptions {
  const calc = config.calc_with_secondary_incidence ?? config.labels.map(() => false)

  return {
    title: config.title,
    labels: [...config.labels],
    descriptions: [...config.descriptions],
    lowerBounds: [...config.lower_bounds],
    colors: [...config.colors],
    calcWithSecondaryIncidence: calc.map((flag) => flag === true),

    aspectRatio: config.aspect_ratio,
    xRange: [config.x_range[0], config.x_range[1]],
    yRange: [config.y_range[0], config.y_range[1]],
    minSpaceX: config.min_space_x,
    minSpaceY: config.min_space_y,
    totalDisplayRegions: config.total_display_regions,
    minDisplayRegions: config.min_display_regions,
    fontSize: config.font_size,

    keys: {
      region: config.region_key,
      primaryIncidence: config.primary_incidence_key,
      secondaryIncidence: config.secondary_incidence_key,
      timeSafe: config.time_safe_key,
      postcode: config.postcode_key,
      percentChange: config.percent_change_key,
    },

    regionType: config.region_type,
    timeSafeUnit: { singular: config.time_safe_unit, plural: config.time_safe_plural_unit },
    incidenceUnit: { singular: config.incidence_unit, plural: config.incidence_plural_unit },

    strings: {
      lastUpdatedText: config.last_updated_text,
      lastUpdatedTime,
      legendTitle: config.legend_title,
      searchbarPlaceholder: config.searchbar_placeholder,
      resetButtonText: config.reset_button_text,
      regionNameTooltip: config.region_name_tooltip,
      categoryTooltip: config.category_tooltip,
      regionCodeTooltip: config.region_code_tooltip,
      timeSafeTooltip: config.time_safe_tooltip,
      primaryIncidenceTooltip: config.primary_incidence_tooltip,
      secondaryIncidenceTooltip: config.secondary_incidence_tooltip,
      percentChangeTooltip: config.percent_change_tooltip,
    },
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ")
}

/**
 * Validate a single visualization's settings and convert them to options.
 */
export function parseVisualizationConfig(raw: unknown, lastUpdatedTime: string | null = null): RankingOptions {
  const parsed = VisualizationConfigSchema.safeParse(raw)
  if (!parsed.success) {
    throw new RankingError("INVALID_CONFIG", `Invalid ranking config: ${describeIssues(parsed.error)}`, parsed.error.issues)
  }
  return toRankingOptions(parsed.data, lastUpdatedTime)
}

/**
 * Validate a config document and return its page title and the first
 * visualization's options.
 */
export function parseConfigDocument(
  raw: unknown,
  lastUpdatedTime: string | null = null,
): { pageTitle: string; name: string; options: RankingOptions } {
  const parsed = ConfigDocumentSchema.safeParse(raw)
  if (!parsed.success) {
    throw new RankingError("INVALID_CONFIG", `Invalid config document: ${describeIssues(parsed.error)}`, parsed.error.issues)
  }

  const [first] = parsed.data.visualizations
  const [name] = Object.keys(first)
  if (name === undefined) {
    throw new RankingError("INVALID_CONFIG", "Invalid config document: the first visualization has no name")
  }

  return {
    pageTitle: parsed.data.page_title,
    name,
    options: parseVisualizationConfig(first[name], lastUpdatedTime),
  }
}
