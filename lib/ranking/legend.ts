import { adjustBranches } from "./branches"
import { formatRatio } from "./format"
import { expandYRange } from "./plot-data"
import type { Category, LegendEntry, Range } from "./types"

/** Boxes shorter than this many label heights get their label on a branch */
export const INLINE_LABEL_MIN_HEIGHT = 2.5
/** Legend labels are two lines tall */
const LABEL_LINES = 2
const BRANCH_LABEL_X = -1.5
const BRANCH_LINE_X: [number, number, number, number] = [-1.475, -1.25, -1.25, -1]

export interface LegendData {
  legend: Array<LegendEntry | null>
  yRange: Range
}

/**
 * Category boxes, one per category (null for empty ones). Large boxes carry
 * their label in the middle; small ones get it to the left on a branch, pushed
 * down when it would collide with the label above.
 */
export function buildLegend(categories: Category[], minSpaceY: number, minSpaceX: number, yRange: Range): LegendData {
  const legend: Array<LegendEntry | null> = []
  let range = yRange
  let boxTop = 1
  let lastTextY = Infinity

  for (const category of categories) {
    const height = category.ratio
    if (height === 0) {
      legend.push(null)
      continue
    }

    const middle = boxTop - height / 2
    const text = `${category.label}\n${formatRatio(height)}`
    let entry: LegendEntry

    if (height >= minSpaceY * INLINE_LABEL_MIN_HEIGHT) {
      entry = {
        boxTopY: boxTop,
        boxBottomY: boxTop - height,
        color: category.color,
        textX: 0,
        textY: middle,
        text,
        lineX: null,
        lineY: null,
      }
    } else {
      let textY = middle
      if ((lastTextY - middle) / LABEL_LINES < minSpaceY) {
        textY = lastTextY - minSpaceY * LABEL_LINES
      }
      entry = {
        boxTopY: boxTop,
        boxBottomY: boxTop - height,
        color: category.color,
        textX: BRANCH_LABEL_X,
        textY,
        text,
        lineX: [...BRANCH_LINE_X],
        lineY: [textY, textY, middle, middle],
      }
    }

    legend.push(entry)
    lastTextY = entry.textY
    range = expandYRange(range, lastTextY)
    boxTop -= height
  }

  adjustBranches(
    legend.filter((entry): entry is LegendEntry => entry !== null),
    "left",
    minSpaceX,
  )

  return { legend, yRange: range }
}
