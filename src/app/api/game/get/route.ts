import { NextResponse } from "next/server";
import { fetchGame } from "@/lib/game";
import { errorResponse, readBody, requireDateKey, requireThreadKey } from "@/lib/http";

export const runtime = "nodejs";

export async function POST(req: Request) {
  try {
    const body = await readBody(req);
    const threadKey = requireThreadKey(body.thread);
    const date = requireDateKey(body.date);
    const game = await fetchGame(threadKey, date);
    return NextResponse.json({ threadKey, date, game });
  } catch (e) {
    return errorResponse("/api/game/get", e, "Failed to fetch game");
  }
}
