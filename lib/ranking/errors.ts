export type RankingErrorCode =
  | "INVALID_CONFIG"
  | "INVALID_BOUNDS"
  | "NO_CATEGORIES"
  | "EMPTY_TABLE"
  | "MISSING_COLUMN"
  | "INVALID_CELL"
  | "SOURCE_UNAVAILABLE"

/**
 * Raised while building a ranking model. These are construction-time failures:
 * nothing is rendered when one is thrown.
 */
export class RankingError extends Error {
  constructor(
    public code: RankingErrorCode,
    message: string,
    public details?: unknown,
  ) {
    super(message)
    this.name = "RankingError"
  }
}

export function isRankingError(error: unknown): error is RankingError {
  return error instanceof RankingError
}
