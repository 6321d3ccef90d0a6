import type { BranchDirection, Branchable } from "./types"

/** A polyline is branched when its label end sits at a different height than its anchor */
export function isBranched(entry: Branchable): boolean {
  return entry.lineY !== null && entry.lineY[1] !== entry.lineY[2]
}

/**
 * Push consecutive branches apart horizontally so their connectors don't cross.
 *
 * Walks bottom-up (last entry first). Each entry in a run of branched entries,
 * plus the first unbranched entry above the run, moves out by
 * `minSpaceX * run`, giving a staircase of offsets. Rightward shifts move the
 * elbow and the label end; leftward shifts move the label end (index 0) and the
 * elbow. Entries without a polyline are left alone. Mutates the entries.
 */
export function adjustBranches<T extends Branchable>(entries: T[], direction: BranchDirection, minSpaceX: number): T[] {
  let run = 0

  for (let i = entries.length - 1; i >= 0; i--) {
    const entry = entries[i]
    if (entry.lineX === null) continue

    const branched = isBranched(entry)
    if (branched || run !== 0) {
      let adjustment = minSpaceX * run
      if (direction === "left") {
        adjustment *= -1
        entry.lineX[0] += adjustment
      } else {
        entry.lineX[3] += adjustment
      }
      entry.lineX[1] += adjustment
      entry.lineX[2] += adjustment
      entry.textX += adjustment
      run++
    }

    if (!branched) run = 0
  }

  return entries
}
