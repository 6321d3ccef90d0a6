import { describe, expect, it } from "vitest"
import { RankingError } from "@/lib/ranking/errors"
import { parseRegionTable, toRegionTable } from "@/lib/ranking/table"
import { SAMPLE_CSV, sampleOptions } from "./fixtures"

const KEYS = sampleOptions().keys

function tableError(csv: string): RankingError {
  try {
    parseRegionTable(csv, KEYS)
  } catch (error) {
    if (error instanceof RankingError) return error
    throw error
  }
  throw new Error("expected the table to be rejected")
}

describe("parseRegionTable", () => {
  it("reads every row with its optional columns", () => {
    const table = parseRegionTable(SAMPLE_CSV, KEYS)

    expect(table.entries).toHaveLength(16)
    expect([...table.columns].sort()).toEqual(["percentChange", "postcode", "secondaryIncidence", "timeSafe"])
    expect(table.entries[11]).toEqual({
      index: 11,
      regionName: "Larkspur",
      postcode: "2112",
      primaryIncidence: 18,
      secondaryIncidence: 10,
      timeSafe: 0,
      percentChange: 11.1,
    })
  })

  it("leaves absent columns null", () => {
    const table = parseRegionTable("Region,Cases 14d\nAshford Vale,4\n", KEYS)

    expect(table.columns.size).toBe(0)
    expect(table.entries[0]).toEqual({
      index: 0,
      regionName: "Ashford Vale",
      postcode: null,
      primaryIncidence: 4,
      secondaryIncidence: null,
      timeSafe: null,
      percentChange: null,
    })
  })

  it("allows blank percent change and postcode cells", () => {
    const table = parseRegionTable("Region,Postcode,Cases 14d,Pct Change\nAshford Vale,,4,\n", KEYS)

    expect(table.entries[0].postcode).toBeNull()
    expect(table.entries[0].percentChange).toBeNull()
  })

  it("strips a byte order mark and surrounding spaces", () => {
    const table = parseRegionTable("\uFEFFRegion,Cases 14d\n  Ashford Vale , 4 \n", KEYS)
    expect(table.entries[0].regionName).toBe("Ashford Vale")
    expect(table.entries[0].primaryIncidence).toBe(4)
  })

  it("rejects a missing required column", () => {
    const error = tableError("Region,Postcode\nAshford Vale,2101\n")

    expect(error.code).toBe("MISSING_COLUMN")
    expect(error.message).toBe('Input table is missing required column "Cases 14d"')
  })

  it("rejects non-numeric cells with their row", () => {
    const error = tableError("Region,Cases 14d\nAshford Vale,4\nBirch Hollow,many\n")

    expect(error.code).toBe("INVALID_CELL")
    expect(error.message).toBe('Row 3: "Cases 14d" must be a number, got "many"')
  })

  it("rejects blank time safe cells", () => {
    expect(tableError("Region,Cases 14d,Case-Free Days\nAshford Vale,0,\n").message).toBe(
      'Row 2: "Case-Free Days" must be a number, got ""',
    )
  })

  it("rejects blank region names", () => {
    expect(tableError("Region,Cases 14d\n,4\n").message).toBe('Row 2: "Region" is empty')
  })

  it("rejects a table without rows", () => {
    expect(tableError("Region,Cases 14d\n").code).toBe("EMPTY_TABLE")
  })

  it("rejects malformed CSV", () => {
    const error = tableError("Region,Cases 14d\nAshford Vale,4,9\n")
    expect(error.code).toBe("INVALID_CELL")
    expect(error.message.startsWith("Input table is not valid CSV:")).toBe(true)
  })
})

describe("toRegionTable", () => {
  it("numbers rows in input order", () => {
    const table = toRegionTable(
      [
        { Region: "A", "Cases 14d": "1" },
        { Region: "B", "Cases 14d": "2" },
      ],
      KEYS,
    )
    expect(table.entries.map((e) => e.index)).toEqual([0, 1])
  })
})
