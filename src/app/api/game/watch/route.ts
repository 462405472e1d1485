import { watchGame } from "@/lib/game";
import { errorResponse, requireDateKey, requireThreadKey } from "@/lib/http";
import type { Unsubscribe } from "@/lib/storage";
import type { GameRecord } from "@/lib/types";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

/**
 * Server-Sent Events feed for one thread/date. The first event is the current
 * record; each later event follows a write. Closing the request ends the
 * subscription.
 */
function readQuery(req: Request): { threadKey: string; date: string } {
  const url = new URL(req.url);
  return {
    threadKey: requireThreadKey({ threadKey: url.searchParams.get("threadKey") ?? undefined }),
    date: requireDateKey(url.searchParams.get("date")),
  };
}

export async function GET(req: Request) {
  let query: { threadKey: string; date: string };
  try {
    query = readQuery(req);
  } catch (e) {
    return errorResponse("/api/game/watch", e, "Failed to watch game");
  }
  const { threadKey, date } = query;

  const encoder = new TextEncoder();
  let unsubscribe: Unsubscribe | null = null;
  let closed = false;

  // Pass the controller to end the stream too; a cancelled stream is over already.
  const close = async (controller?: ReadableStreamDefaultController<Uint8Array>) => {
    if (closed) return;
    closed = true;
    controller?.close();
    const stop = unsubscribe;
    unsubscribe = null;
    if (stop) await stop();
  };

  const stream = new ReadableStream<Uint8Array>({
    async start(controller) {
      const send = (game: GameRecord | null) => {
        if (closed) return;
        controller.enqueue(encoder.encode(`data: ${JSON.stringify({ game })}\n\n`));
      };
      const onAbort = () => {
        close(controller).catch((err: unknown) => console.error("Error closing /api/game/watch:", err));
      };
      if (req.signal.aborted) {
        onAbort();
        return;
      }
      req.signal.addEventListener("abort", onAbort, { once: true });

      let sub: Unsubscribe;
      try {
        sub = await watchGame(threadKey, date, send, (err) => {
          console.error("Error in /api/game/watch subscription:", err);
        });
      } catch (e) {
        console.error("Error in /api/game/watch:", e);
        req.signal.removeEventListener("abort", onAbort);
        if (!closed) {
          closed = true;
          controller.error(e);
        }
        return;
      }
      if (closed) {
        // The client went away while we were subscribing.
        await sub();
        return;
      }
      unsubscribe = sub;
    },
    async cancel() {
      await close();
    },
  });

  return new Response(stream, {
    headers: {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache, no-transform",
      Connection: "keep-alive",
    },
  });
}
