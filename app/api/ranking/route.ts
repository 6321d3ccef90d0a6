import { NextRequest, NextResponse } from "next/server"
import { z } from "zod"
import { getRanking, isRankingError, readSourceSettings, SessionStore, type RankingLayout } from "@/lib/ranking"
import type { LayoutSnapshot, RankingResponse } from "@/lib/ranking/types"

// =============================================================================
// Ranking API
// GET returns the caller's chart; POST runs a search ({ query }) or a reset
// ({ reset: true }). Each browser gets its own layout via a session cookie.
// =============================================================================

export const dynamic = "force-dynamic"
export const runtime = "nodejs"

const SESSION_COOKIE = "ranking_session"

const BodySchema = z.union([
  z.object({ query: z.string().trim() }),
  z.object({ reset: z.literal(true) }),
])

let storePromise: Promise<{ store: SessionStore; pageTitle: string }> | null = null

function getStore() {
  if (!storePromise) {
    storePromise = (async () => {
      const settings = readSourceSettings()
      const { model, pageTitle } = await getRanking(settings)
      return { store: new SessionStore(model, { ttlMs: settings.sessionTtlMs }), pageTitle }
    })()
    // Let the next request retry if loading failed
    storePromise.catch(() => {
      storePromise = null
    })
  }
  return storePromise
}

async function acquireLayout(request: NextRequest) {
  const { store, pageTitle } = await getStore()
  const session = store.acquire(request.cookies.get(SESSION_COOKIE)?.value)
  return { ...session, pageTitle }
}

function respond(
  session: { sessionId: string; layout: RankingLayout; created: boolean; pageTitle: string },
  run: (layout: RankingLayout) => LayoutSnapshot,
) {
  const body: RankingResponse = { pageTitle: session.pageTitle, ...run(session.layout) }
  const response = NextResponse.json(body)
  if (session.created) {
    response.cookies.set(SESSION_COOKIE, session.sessionId, { httpOnly: true, sameSite: "lax", path: "/" })
  }
  return response
}

function failure(error: unknown) {
  console.error("[Ranking] Request failed:", error)
  const message = isRankingError(error) ? error.message : "Failed to build ranking chart"
  return NextResponse.json({ error: message }, { status: 500 })
}

export async function GET(request: NextRequest) {
  try {
    const session = await acquireLayout(request)
    return respond(session, (layout) => layout.snapshot())
  } catch (error) {
    return failure(error)
  }
}

export async function POST(request: NextRequest) {
  let body: z.infer<typeof BodySchema>
  try {
    const parsed = BodySchema.safeParse(await request.json())
    if (!parsed.success) {
      return NextResponse.json({ error: "Expected { query: string } or { reset: true }" }, { status: 400 })
    }
    body = parsed.data
  } catch {
    return NextResponse.json({ error: "Request body must be JSON" }, { status: 400 })
  }

  try {
    const session = await acquireLayout(request)
    if ("reset" in body) {
      return respond(session, (layout) => layout.reset())
    }
    const { query } = body
    return respond(session, (layout) => layout.search(query))
  } catch (error) {
    return failure(error)
  }
}
