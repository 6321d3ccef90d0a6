/**
 * Ranking Data Sources
 *
 * Resolves where the config, region table and last-updated stamp come from,
 * reads them (from disk, or over HTTP when downloads are enabled) and builds
 * the shared RankingModel. The model is loaded once per process.
 */

import fs from "node:fs/promises"
import path from "node:path"
import { z } from "zod"
import { parseConfigDocument } from "./config"
import { RankingError } from "./errors"
import { createRankingModel, type RankingModel } from "./layout"
import { parseRegionTable } from "./table"

const DEFAULT_SESSION_TTL_MS = 30 * 60 * 1000

const EnvSchema = z.object({
  RANKING_CONFIG_FILE: z.string().min(1).default("config/ranking.json"),
  RANKING_DATA_FILE: z.string().min(1).default("data/regions.csv"),
  RANKING_LAST_UPDATED_FILE: z.string().min(1).default("data/last-updated.log"),
  RANKING_DOWNLOAD: z
    .string()
    .optional()
    .transform((value) => value?.toLowerCase() === "true"),
  RANKING_SESSION_TTL_MS: z.coerce.number().int().positive().default(DEFAULT_SESSION_TTL_MS),
})

export interface SourceSettings {
  configFile: string
  dataFile: string
  lastUpdatedFile: string
  /** Treat the three locations as URLs */
  download: boolean
  sessionTtlMs: number
}

export interface LoadedRanking {
  pageTitle: string
  name: string
  model: RankingModel
}

export function readSourceSettings(env: Record<string, string | undefined> = process.env): SourceSettings {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const message = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ")
    throw new RankingError("INVALID_CONFIG", `Invalid ranking environment: ${message}`, parsed.error.issues)
  }
  return {
    configFile: parsed.data.RANKING_CONFIG_FILE,
    dataFile: parsed.data.RANKING_DATA_FILE,
    lastUpdatedFile: parsed.data.RANKING_LAST_UPDATED_FILE,
    download: parsed.data.RANKING_DOWNLOAD,
    sessionTtlMs: parsed.data.RANKING_SESSION_TTL_MS,
  }
}

/**
 * Read a source as text. Returns null when it doesn't exist (missing file, or
 * a non-OK response when downloading).
 */
export async function readSourceText(location: string, download: boolean): Promise<string | null> {
  if (download) {
    console.log(`[Ranking] Downloading ${location}`)
    const response = await fetch(location)
    console.log(`[Ranking] Download completed, status code: ${response.status}`)
    if (!response.ok) return null
    return response.text()
  }

  try {
    return await fs.readFile(path.resolve(location), "utf-8")
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return null
    throw error
  }
}

async function requireSourceText(location: string, download: boolean, what: string): Promise<string> {
  const text = await readSourceText(location, download)
  if (text === null) {
    throw new RankingError("SOURCE_UNAVAILABLE", `Could not read ${what} at ${location}`, { location })
  }
  return text
}

/** First line of the last-updated file, or null if there isn't one */
export function parseLastUpdated(text: string | null): string | null {
  if (text === null) return null
  const [first] = text.split(/\r?\n/)
  const trimmed = first.trim()
  return trimmed === "" ? null : trimmed
}

function parseJson(text: string, location: string): unknown {
  try {
    return JSON.parse(text)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new RankingError("INVALID_CONFIG", `Config at ${location} is not valid JSON: ${message}`)
  }
}

export async function loadRanking(settings: SourceSettings): Promise<LoadedRanking> {
  console.log(`[Ranking] Using config file at ${settings.configFile}`)
  const configText = await requireSourceText(settings.configFile, settings.download, "config file")

  console.log(`[Ranking] Reading last updated time from ${settings.lastUpdatedFile}`)
  const lastUpdated = parseLastUpdated(await readSourceText(settings.lastUpdatedFile, settings.download))
  console.log(`[Ranking] Last updated: ${lastUpdated ?? "unknown"}`)

  const { pageTitle, name, options } = parseConfigDocument(parseJson(configText, settings.configFile), lastUpdated)

  const dataText = await requireSourceText(settings.dataFile, settings.download, "region table")
  const table = parseRegionTable(dataText, options.keys)
  const model = createRankingModel(table, options)

  console.log(
    `[Ranking] Loaded "${name}": ${table.entries.length} regions in ${model.categories.length} categories (${model.categories
      .map((category) => category.pool.length)
      .join("/")})`,
  )
  return { pageTitle, name, model }
}

let rankingCache: LoadedRanking | null = null
let rankingPromise: Promise<LoadedRanking> | null = null

/**
 * The process-wide ranking, loaded from the environment's sources on first use.
 */
export async function getRanking(settings: SourceSettings = readSourceSettings()): Promise<LoadedRanking> {
  if (rankingCache) return rankingCache
  if (rankingPromise) return rankingPromise

  rankingPromise = (async () => {
    try {
      const loaded = await loadRanking(settings)
      rankingCache = loaded
      return loaded
    } catch (error) {
      console.error("[Ranking] Failed to load ranking:", error)
      throw error
    } finally {
      rankingPromise = null
    }
  })()

  return rankingPromise
}

export function clearRankingCache(): void {
  rankingCache = null
  rankingPromise = null
}
