import { NextResponse } from "next/server";
import { todayDateKey } from "@/lib/dateKey";
import { gameDocPath } from "@/lib/docPaths";
import { StoreUnavailableError, errorMessage } from "@/lib/errors";
import { fetchGameResult } from "@/lib/game";
import { errorResponse } from "@/lib/http";
import { activeBackend, kvSetJSON } from "@/lib/storage";
import { threadKey } from "@/lib/threadKey";
import type { GameRecord } from "@/lib/types";

export const runtime = "nodejs";

// Only this check writes under this thread; it never joins the game index.
const CHECK_THREAD = threadKey(["storage-check"]);

/**
 * Writes a short-lived game where a real one would live and reads it back
 * through the record model, so a pass means fetch and start would work too.
 */
export async function GET() {
  const date = todayDateKey();
  const path = gameDocPath(CHECK_THREAD, date);
  const written: GameRecord = {
    startingWord: "CHECK",
    playerScores: [{ id: "storage-check", name: "Storage check", score: "3" }],
  };

  try {
    await kvSetJSON(path, written, { exSeconds: 120 }).catch((e: unknown) => {
      throw new StoreUnavailableError(`Failed to write check game: ${errorMessage(e, "store unreachable")}`, {
        cause: e,
      });
    });
    const read = await fetchGameResult(CHECK_THREAD, date);
    const ok = read.status === "found" && JSON.stringify(read.game) === JSON.stringify(written);
    if (!ok) console.error(`Storage check at ${path} read back ${read.status}`);
    return NextResponse.json(
      { ok, backend: activeBackend(), path, status: read.status },
      { status: ok ? 200 : 500 },
    );
  } catch (e) {
    return errorResponse("/api/debug/kv-test", e, "Storage check failed");
  }
}
