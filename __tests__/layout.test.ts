import { describe, expect, it } from "vitest"
import { buildCompletions, buildTooltips, RankingLayout } from "@/lib/ranking/layout"
import { entry, names, sampleModel, tableOf } from "./fixtures"

describe("RankingLayout", () => {
  it("starts with the default selection and nothing highlighted", () => {
    const layout = new RankingLayout(sampleModel())
    const snapshot = layout.snapshot()

    expect(snapshot.lines).toHaveLength(11)
    expect(snapshot.highlighted).toEqual([])
    expect(snapshot.lastSearched).toBe("")
    expect(snapshot.legend).toHaveLength(3)
    expect(snapshot.xRange).toEqual([-4, 7])
    expect(snapshot.yRange).toEqual([-0.075, 1.075])
    expect(snapshot.bindings.title).toBe("District Case Rankings")
  })

  it("highlights a searched region and adds it to the chart", () => {
    const layout = new RankingLayout(sampleModel())
    const snapshot = layout.search("Northgate")

    expect(snapshot.lastSearched).toBe("Northgate")
    expect(snapshot.highlighted.map((line) => line.regionName)).toEqual(["Northgate"])
    expect(snapshot.lines).toHaveLength(11)
    expect(names(layout.getDisplaySets()[2])).toEqual(["Millbrook", "Oakhurst", "Northgate", "Pinecrest"])
  })

  it("highlights an already shown region without changing the selection", () => {
    const layout = new RankingLayout(sampleModel())
    const before = layout.getDisplaySets().map(names)
    const snapshot = layout.search("2113")

    expect(snapshot.highlighted.map((line) => line.regionName)).toEqual(["Millbrook"])
    expect(snapshot.lines).toHaveLength(10)
    expect(layout.getDisplaySets().map(names)).toEqual(before)
  })

  it("keeps the selection for an unknown query", () => {
    const layout = new RankingLayout(sampleModel())
    const snapshot = layout.search("Nowhere")

    expect(snapshot.lastSearched).toBe("Nowhere")
    expect(snapshot.highlighted).toEqual([])
    expect(snapshot.lines).toHaveLength(11)
  })

  it("resets to the initial layout", () => {
    const layout = new RankingLayout(sampleModel())
    const initial = layout.snapshot()

    layout.search("Northgate")
    layout.search("Birch Hollow")
    expect(layout.getDisplaySets().map((set) => set.length)).toEqual([5, 4, 4])

    const reset = layout.reset()
    expect(reset.lastSearched).toBe("")
    expect(reset.highlighted).toEqual([])
    expect(reset.lines).toEqual(initial.lines)
    expect(layout.reset().lines).toEqual(initial.lines)
  })

  it("treats an empty search as a reset", () => {
    const layout = new RankingLayout(sampleModel())
    layout.search("Northgate")

    const snapshot = layout.search("")
    expect(layout.getLastSearched()).toBe("")
    expect(snapshot.highlighted).toEqual([])
    expect(layout.getDisplaySets().map((set) => set.length)).toEqual([4, 4, 3])
  })

  it("keeps sessions independent", () => {
    const model = sampleModel()
    const first = new RankingLayout(model)
    const second = new RankingLayout(model)

    first.search("Northgate")
    expect(second.getDisplaySets()[2]).toHaveLength(3)
    expect(model.categories[2].pool).toHaveLength(4)
  })
})

describe("bindings", () => {
  it("lists names, then postcodes", () => {
    const completions = buildCompletions(
      tableOf([
        entry(0, "A", 0, { postcode: "1000" }),
        entry(1, "B", 0, { postcode: "0" }),
        entry(2, "C", 0),
      ]),
    )
    expect(completions).toEqual(["A", "B", "C", "1000"])
  })

  it("includes every tooltip row the table has columns for", () => {
    const rows = buildTooltips(sampleModel())
    expect(rows).toEqual([
      { label: "Region Name", field: "regionName" },
      { label: "Region Code", field: "postcode" },
      { label: "Category", field: "category" },
      { label: "COVID-Free Days", field: "timeSafe" },
      { label: "New Cases in Last 14 Days", field: "primaryIncidence" },
      { label: "New Cases in Last 7 Days", field: "secondaryIncidence" },
      { label: "Weekly Percent Change", field: "percentChange" },
    ])
  })

  it("drops tooltip rows for missing columns", () => {
    const model = sampleModel()
    const rows = buildTooltips({ ...model, table: { ...model.table, columns: new Set(["timeSafe"]) } })
    expect(rows.map((row) => row.field)).toEqual(["regionName", "category", "timeSafe", "primaryIncidence"])
  })

  it("exposes the sample completions", () => {
    const { bindings } = new RankingLayout(sampleModel()).snapshot()
    expect(bindings.completions).toHaveLength(32)
    expect(bindings.completions[15]).toBe("Pinecrest")
    expect(bindings.completions[16]).toBe("2101")
    expect(bindings.labels).toEqual(["Green Zone", "Low Incidence", "High Incidence"])
  })
})
