import type { DatedGame, GameRecord, PlayerStatsRow, Score, ThreadInput, ThreadMessage, UserProfile } from "@/lib/types";

export type GameResponse = { threadKey: string; date: string; game: GameRecord | null };
export type StartGameResponse = { ok: true; threadKey: string; date: string; game: GameRecord; message: ThreadMessage };
export type SubmitScoreResponse = { ok: true; threadKey: string; date: string; game: GameRecord };
export type StatsResponse = { threadKey: string; games: DatedGame[]; players: PlayerStatsRow[] };

type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

type ClientOptions = {
  baseUrl?: string;
  fetch?: FetchLike;
};

/**
 * Thin typed wrapper over the scoreboard routes for any front end. Failed
 * calls throw an Error carrying the server's message verbatim.
 */
export function createScoreboardClient(opts: ClientOptions = {}) {
  const baseUrl = (opts.baseUrl ?? "").replace(/\/+$/, "");
  const doFetch: FetchLike = opts.fetch ?? ((url, init) => fetch(url, init));

  async function post<T>(path: string, body: unknown, fallback: string): Promise<T> {
    const res = await doFetch(`${baseUrl}${path}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
    let data: unknown = null;
    try {
      data = await res.json();
    } catch {
      // non-JSON body; fall back to the generic message below
    }
    if (!res.ok) {
      const msg =
        typeof data === "object" && data !== null && "error" in data && typeof data.error === "string"
          ? data.error
          : fallback;
      throw new Error(msg);
    }
    return data as T;
  }

  return {
    getGame(thread: ThreadInput, date?: string) {
      return post<GameResponse>("/api/game/get", { thread, date }, "Failed to fetch game");
    },
    startGame(thread: ThreadInput, startingWord: string, profile: UserProfile, date?: string) {
      return post<StartGameResponse>(
        "/api/game/start",
        { thread, date, startingWord, profile },
        "Failed to start game",
      );
    },
    submitScore(thread: ThreadInput, score: Score, profile: UserProfile, date?: string) {
      return post<SubmitScoreResponse>("/api/game/score", { thread, date, score, profile }, "Failed to update scores");
    },
    getStats(thread: ThreadInput) {
      return post<StatsResponse>("/api/stats", { thread }, "Failed to load stats");
    },
    watchUrl(threadKey: string, date: string) {
      const qs = new URLSearchParams({ threadKey, date });
      return `${baseUrl}/api/game/watch?${qs.toString()}`;
    },
  };
}

export type ScoreboardClient = ReturnType<typeof createScoreboardClient>;
