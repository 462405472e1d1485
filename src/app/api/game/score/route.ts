import { NextResponse } from "next/server";
import { submitScore } from "@/lib/game";
import {
  errorResponse,
  readBody,
  requireDateKey,
  requireProfile,
  requireScore,
  requireThreadKey,
} from "@/lib/http";

export const runtime = "nodejs";

export async function POST(req: Request) {
  try {
    const body = await readBody(req);
    const threadKey = requireThreadKey(body.thread);
    const date = requireDateKey(body.date);
    const profile = requireProfile(body.profile);
    const score = requireScore(body.score);

    const game = await submitScore(threadKey, date, profile.id, profile.displayName, score);
    return NextResponse.json({ ok: true, threadKey, date, game });
  } catch (e) {
    return errorResponse("/api/game/score", e, "Failed to update scores");
  }
}
