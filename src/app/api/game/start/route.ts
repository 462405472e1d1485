import { NextResponse } from "next/server";
import { startGame } from "@/lib/game";
import {
  errorResponse,
  readBody,
  requireDateKey,
  requireProfile,
  requireStartingWord,
  requireThreadKey,
} from "@/lib/http";
import { buildStartMessage } from "@/lib/message";
import type { GameRecord, ThreadMessage } from "@/lib/types";

export const runtime = "nodejs";

type StartResponse = {
  ok: true;
  threadKey: string;
  date: string;
  game: GameRecord;
  message: ThreadMessage; // for the host app to insert into the conversation
};

export async function POST(req: Request) {
  try {
    const body = await readBody(req);
    const threadKey = requireThreadKey(body.thread);
    const date = requireDateKey(body.date);
    const startingWord = requireStartingWord(body.startingWord);
    const profile = requireProfile(body.profile);

    const game = await startGame(threadKey, date, startingWord);
    const res: StartResponse = {
      ok: true,
      threadKey,
      date,
      game,
      message: buildStartMessage({ dateKey: date, startingWord, starter: profile.displayName }),
    };
    return NextResponse.json(res);
  } catch (e) {
    return errorResponse("/api/game/start", e, "Failed to start game");
  }
}
