import type { Unit } from "./types"

export function unitFor(unit: Unit, quantity: number): string {
  return quantity === 1 ? unit.singular : unit.plural
}

/** 0.125 -> "12.5%" */
export function formatRatio(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`
}

/** Percent values are already scaled: 12.5 -> "12.5%" */
export function formatPercentChange(percent: number | null): string | null {
  if (percent === null) return null
  return `${percent.toFixed(1)}%`
}

export function formatRegionLabel(regionName: string, value: number, unit: Unit): string {
  return `${regionName}: ${value} ${unitFor(unit, value)}`
}
