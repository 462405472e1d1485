import { NextResponse } from "next/server";
import { listGames } from "@/lib/game";
import { errorResponse, readBody, requireThreadKey } from "@/lib/http";
import { aggregatePlayerStats, sortPlayerStats } from "@/lib/stats";

export const runtime = "nodejs";

export async function POST(req: Request) {
  try {
    const body = await readBody(req);
    const threadKey = requireThreadKey(body.thread);
    const games = await listGames(threadKey);
    const players = sortPlayerStats(aggregatePlayerStats(games.map((g) => g.game)));
    return NextResponse.json({ threadKey, games, players });
  } catch (e) {
    return errorResponse("/api/stats", e, "Failed to load stats");
  }
}
