import type { Range } from "./types"

export interface PixelScale {
  width: number
  height: number
  x: (value: number) => number
  y: (value: number) => number
}

/**
 * Map chart coordinates onto a pixel box. Chart y grows upward, SVG y grows
 * downward, so the top of `yRange` lands at pixel 0.
 */
export function createScale(xRange: Range, yRange: Range, width: number, aspectRatio: number): PixelScale {
  const height = width / aspectRatio
  const [x0, x1] = xRange
  const [y0, y1] = yRange

  return {
    width,
    height,
    x: (value) => ((value - x0) / (x1 - x0)) * width,
    y: (value) => ((y1 - value) / (y1 - y0)) * height,
  }
}

export function toPoints(xs: readonly number[], ys: readonly number[], scale: PixelScale): string {
  return xs.map((x, i) => `${scale.x(x)},${scale.y(ys[i])}`).join(" ")
}
