import { describe, expect, it } from "vitest"
import { formatPercentChange, formatRatio, formatRegionLabel, unitFor } from "@/lib/ranking/format"

const DAYS = { singular: "day", plural: "days" }

describe("format", () => {
  it("picks the singular unit only for one", () => {
    expect(unitFor(DAYS, 1)).toBe("day")
    expect(unitFor(DAYS, 0)).toBe("days")
    expect(unitFor(DAYS, 2)).toBe("days")
  })

  it("labels a region with its value", () => {
    expect(formatRegionLabel("Dunmore", 3, DAYS)).toBe("Dunmore: 3 days")
    expect(formatRegionLabel("Dunmore", 1, DAYS)).toBe("Dunmore: 1 day")
  })

  it("formats ratios and percent changes to one decimal", () => {
    expect(formatRatio(0.125)).toBe("12.5%")
    expect(formatRatio(1)).toBe("100.0%")
    expect(formatPercentChange(-20)).toBe("-20.0%")
    expect(formatPercentChange(null)).toBeNull()
  })
})
