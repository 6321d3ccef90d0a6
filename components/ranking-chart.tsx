"use client"

import { useCallback, useEffect, useMemo, useState, type FormEvent } from "react"
import { AlertTriangle, RotateCcw, Search } from "lucide-react"
import { Button } from "@/components/ui/button"
import { cn } from "@/lib/utils"
import { createScale, toPoints, type PixelScale } from "@/lib/ranking/scale"
import type { LegendEntry, LineEntry, RankingResponse, TooltipRow } from "@/lib/ranking/types"

const CHART_WIDTH = 960
const API_PATH = "/api/ranking"

async function requestRanking(body?: { query: string } | { reset: true }): Promise<RankingResponse> {
  const response = await fetch(API_PATH, {
    method: body ? "POST" : "GET",
    headers: body ? { "Content-Type": "application/json" } : undefined,
    body: body ? JSON.stringify(body) : undefined,
    cache: "no-store",
  })
  if (!response.ok) {
    throw new Error(`Ranking request failed: ${response.status}`)
  }
  return (await response.json()) as RankingResponse
}

function tooltipText(line: LineEntry, rows: TooltipRow[]): string {
  return rows.map((row) => `${row.label}: ${line[row.field] ?? ""}`).join("\n")
}

function LegendBox({ entry, scale, fontSize }: { entry: LegendEntry; scale: PixelScale; fontSize: number }) {
  const branched = entry.lineX !== null && entry.lineY !== null
  const [firstLine, ...rest] = entry.text.split("\n")

  return (
    <g>
      <rect
        x={scale.x(-1)}
        y={scale.y(entry.boxTopY)}
        width={scale.x(1) - scale.x(-1)}
        height={scale.y(entry.boxBottomY) - scale.y(entry.boxTopY)}
        fill={entry.color}
        stroke="#000000"
      />
      {entry.lineX && entry.lineY && (
        <polyline points={toPoints(entry.lineX, entry.lineY, scale)} fill="none" stroke={entry.color} />
      )}
      <text
        x={scale.x(entry.textX)}
        y={scale.y(entry.textY)}
        fontSize={fontSize}
        textAnchor={branched ? "end" : "middle"}
        dominantBaseline="middle"
      >
        <tspan x={scale.x(entry.textX)} dy={-fontSize / 2}>
          {firstLine}
        </tspan>
        {rest.map((line, i) => (
          <tspan key={i} x={scale.x(entry.textX)} dy={fontSize}>
            {line}
          </tspan>
        ))}
      </text>
    </g>
  )
}

function RegionLine({
  line,
  scale,
  fontSize,
  tooltips,
  bold,
}: {
  line: LineEntry
  scale: PixelScale
  fontSize: number
  tooltips: TooltipRow[]
  bold?: boolean
}) {
  return (
    <g>
      <polyline points={toPoints(line.lineX, line.lineY, scale)} fill="none" stroke={line.lineColor} />
      <text
        x={scale.x(line.textX)}
        y={scale.y(line.textY)}
        fontSize={fontSize}
        fontWeight={bold ? "bold" : "normal"}
        dominantBaseline="middle"
        className="cursor-help"
      >
        <title>{tooltipText(line, tooltips)}</title>
        {line.text}
      </text>
    </g>
  )
}

export function RankingChart({ className }: { className?: string }) {
  const [data, setData] = useState<RankingResponse | null>(null)
  const [error, setError] = useState<string | null>(null)
  const [query, setQuery] = useState("")
  const [pending, setPending] = useState(false)

  const run = useCallback(async (body?: { query: string } | { reset: true }) => {
    setPending(true)
    try {
      setData(await requestRanking(body))
      setError(null)
    } catch (err) {
      console.error("Ranking request failed:", err)
      setError("Could not load the chart. Please try again.")
    } finally {
      setPending(false)
    }
  }, [])

  useEffect(() => {
    void run()
  }, [run])

  const completions = useMemo(() => new Set(data?.bindings.completions ?? []), [data])

  const handleChange = (value: string) => {
    setQuery(value)
    // Picking a suggestion searches straight away
    if (completions.has(value)) void run({ query: value })
  }

  const handleSubmit = (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault()
    void run({ query: query.trim() })
  }

  const handleReset = () => {
    setQuery("")
    void run({ reset: true })
  }

  if (error && !data) {
    return (
      <div className="flex items-center gap-2 rounded-md border border-red-200 bg-red-50 p-4 text-sm text-red-700">
        <AlertTriangle className="h-4 w-4" />
        {error}
      </div>
    )
  }

  if (!data) {
    return <div className="h-96 animate-pulse rounded-md bg-slate-100" />
  }

  const { bindings } = data
  const scale = createScale(data.xRange, data.yRange, CHART_WIDTH, bindings.aspectRatio)

  return (
    <div className={cn("flex flex-col gap-6 lg:flex-row", className)}>
      <div className="flex-1">
        <h1 className="text-2xl font-semibold">{bindings.title}</h1>
        {bindings.lastUpdatedTime && (
          <p className="text-sm text-slate-500">
            {bindings.lastUpdatedText}: {bindings.lastUpdatedTime}
          </p>
        )}
        <svg
          viewBox={`0 0 ${scale.width} ${scale.height}`}
          className="mt-4 h-auto w-full"
          role="img"
          aria-label={bindings.title}
        >
          {data.legend.map((entry, i) =>
            entry ? <LegendBox key={i} entry={entry} scale={scale} fontSize={bindings.fontSize} /> : null,
          )}
          {data.lines.map((line, i) => (
            <RegionLine key={i} line={line} scale={scale} fontSize={bindings.fontSize} tooltips={bindings.tooltips} />
          ))}
          {data.highlighted.map((line) => (
            <RegionLine
              key={`highlight-${line.regionName}`}
              line={line}
              scale={scale}
              fontSize={bindings.fontSize}
              tooltips={bindings.tooltips}
              bold
            />
          ))}
        </svg>
      </div>

      <aside className="flex w-full flex-col gap-4 lg:w-80">
        <Button variant="outline" onClick={handleReset} disabled={pending}>
          <RotateCcw />
          {bindings.resetButtonText}
        </Button>
        <form onSubmit={handleSubmit} className="relative">
          <Search className="pointer-events-none absolute left-3 top-1/2 h-4 w-4 -translate-y-1/2 text-slate-400" />
          <input
            list="ranking-completions"
            value={query}
            onChange={(event) => handleChange(event.target.value)}
            placeholder={bindings.searchbarPlaceholder}
            className="h-9 w-full rounded-md border border-slate-300 pl-9 pr-3 text-sm"
          />
          <datalist id="ranking-completions">
            {bindings.completions.map((completion, i) => (
              <option key={i} value={completion} />
            ))}
          </datalist>
        </form>
        {error && <p className="text-sm text-red-600">{error}</p>}

        <div>
          <h2 className="mb-2 text-lg font-semibold">{bindings.legendTitle}</h2>
          <ul className="space-y-2">
            {bindings.labels.map((label, i) => (
              <li key={i} className="flex gap-2 text-sm">
                <span className="mt-1 h-3 w-3 shrink-0 rounded-sm" style={{ backgroundColor: bindings.colors[i] }} />
                <span>
                  <span className="font-medium">{label}</span>
                  {bindings.descriptions[i] && <span className="text-slate-600"> {bindings.descriptions[i]}</span>}
                </span>
              </li>
            ))}
          </ul>
        </div>
      </aside>
    </div>
  )
}
