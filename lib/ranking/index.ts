/**
 * Ranking Module
 *
 * Categorizes regions into severity bands, picks which rows to show, and lays
 * them out as non-overlapping labelled lines for the ranking chart.
 */

// Types
export type {
  RegionEntry,
  RegionTable,
  Category,
  LineEntry,
  LegendEntry,
  LayoutSnapshot,
  DisplayBindings,
  TooltipRow,
  Range,
} from "./types"

export { RankingError, isRankingError, type RankingErrorCode } from "./errors"
export { parseConfigDocument, parseVisualizationConfig, type RankingOptions } from "./config"
export { parseRegionTable, toRegionTable } from "./table"

// Layout engine
export { buildCategories } from "./categorize"
export { selectDisplayRegions, injectSearchedRegion } from "./display"
export { buildPlotData, expandYRange } from "./plot-data"
export { buildLegend } from "./legend"
export { adjustBranches } from "./branches"
export { RankingLayout, createRankingModel, type RankingModel } from "./layout"

// Serving
export { getRanking, readSourceSettings, clearRankingCache, type LoadedRanking } from "./sources"
export { SessionStore } from "./session-store"
