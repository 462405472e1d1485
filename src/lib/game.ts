import { SCORE_LOCK_TTL_SECONDS, SCORE_LOCK_WAIT_MS } from "@/lib/constants";
import { gameDocLockKey, gameDocPath, gameIndexPath } from "@/lib/docPaths";
import { GameNotStartedError, StoreUnavailableError, errorMessage } from "@/lib/errors";
import { isRecord } from "@/lib/guards";
import {
  kvGetJSON,
  kvReleaseLock,
  kvSetJSON,
  kvTryAcquireLock,
  kvWatchJSON,
  type Unsubscribe,
} from "@/lib/storage";
import type { DatedGame, FetchGameResult, GameRecord, PlayerScore } from "@/lib/types";

export function parsePlayerScore(raw: unknown): PlayerScore | null {
  if (!isRecord(raw)) return null;
  const { id, name, score } = raw;
  if (typeof id !== "string" || typeof name !== "string" || typeof score !== "string") return null;
  return { id, name, score };
}

/**
 * The store is schemaless, so every read comes through here. A doc without a
 * string `startingWord` and an array `playerScores` is not a game; entries
 * missing a string field are dropped rather than failing the whole record.
 */
export function parseGameRecord(raw: unknown): GameRecord | null {
  if (!isRecord(raw)) return null;
  const { startingWord, playerScores } = raw;
  if (typeof startingWord !== "string" || !Array.isArray(playerScores)) return null;
  const scores: PlayerScore[] = [];
  for (const entry of playerScores) {
    const parsed = parsePlayerScore(entry);
    if (parsed) scores.push(parsed);
  }
  return { startingWord, playerScores: scores };
}

/** Replace the entry with the same id in place, or append. Never mutates `scores`. */
export function upsertPlayerScore(scores: readonly PlayerScore[], entry: PlayerScore): PlayerScore[] {
  const idx = scores.findIndex((s) => s.id === entry.id);
  if (idx === -1) return [...scores, { ...entry }];
  return scores.map((s, i) => (i === idx ? { ...s, name: entry.name, score: entry.score } : s));
}

async function withStore<T>(what: string, op: () => Promise<T>): Promise<T> {
  try {
    return await op();
  } catch (e) {
    if (e instanceof StoreUnavailableError || e instanceof GameNotStartedError) throw e;
    throw new StoreUnavailableError(`Failed to ${what}: ${errorMessage(e, "store unreachable")}`, { cause: e });
  }
}

function sleep(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

async function withDocLock<T>(lockKey: string, fn: () => Promise<T>): Promise<T> {
  const start = Date.now();
  let delay = 50;
  const acquire = () => withStore("lock game", () => kvTryAcquireLock({ key: lockKey, ttlSeconds: SCORE_LOCK_TTL_SECONDS }));
  let token = await acquire();
  while (!token) {
    if (Date.now() - start >= SCORE_LOCK_WAIT_MS) {
      throw new StoreUnavailableError("Another update is in progress. Try again in a moment.");
    }
    await sleep(delay);
    delay = Math.min(500, Math.round(delay * 1.35));
    token = await acquire();
  }
  const held = token;
  try {
    return await fn();
  } finally {
    // Not fatal: an unreleased lock frees itself when its TTL runs out.
    await kvReleaseLock(lockKey, held).catch((e: unknown) => {
      console.error(`Failed to release ${lockKey}:`, e);
    });
  }
}

export async function fetchGameResult(threadKey: string, dateKey: string): Promise<FetchGameResult> {
  const path = gameDocPath(threadKey, dateKey);
  const raw = await withStore("fetch game", () => kvGetJSON(path));
  if (raw === null) return { status: "absent" };
  const game = parseGameRecord(raw);
  if (!game) {
    console.warn(`Malformed game record at ${path}; treating it as not started.`);
    return { status: "malformed", raw };
  }
  return { status: "found", game };
}

export async function fetchGame(threadKey: string, dateKey: string): Promise<GameRecord | null> {
  const res = await fetchGameResult(threadKey, dateKey);
  return res.status === "found" ? res.game : null;
}

function parseIndex(raw: unknown): string[] {
  const dates = isRecord(raw) ? raw.dates : null;
  if (!Array.isArray(dates)) return [];
  return dates.filter((d): d is string => typeof d === "string");
}

async function addToIndex(threadKey: string, dateKey: string): Promise<void> {
  const path = gameIndexPath(threadKey);
  await withDocLock(`lock:${path}`, async () => {
    const dates = parseIndex(await withStore("read game index", () => kvGetJSON(path)));
    if (dates.includes(dateKey)) return;
    await withStore("update game index", () => kvSetJSON(path, { dates: [...dates, dateKey] }));
  });
}

/**
 * Creates the day's game, or overwrites one already there. The caller has
 * already upper-cased and length-checked `startingWord`.
 */
export async function startGame(threadKey: string, dateKey: string, startingWord: string): Promise<GameRecord> {
  const game: GameRecord = { startingWord, playerScores: [] };
  // Index first: a listed date with no doc is skipped by listGames, while a doc
  // missing from the index would never reach history.
  await addToIndex(threadKey, dateKey);
  await withStore("start game", () => kvSetJSON(gameDocPath(threadKey, dateKey), game));
  return game;
}

export async function submitScore(
  threadKey: string,
  dateKey: string,
  playerId: string,
  name: string,
  score: string,
): Promise<GameRecord> {
  return withDocLock(gameDocLockKey(threadKey, dateKey), async () => {
    const cur = await fetchGameResult(threadKey, dateKey);
    if (cur.status !== "found") throw new GameNotStartedError(threadKey, dateKey);
    const next: GameRecord = {
      startingWord: cur.game.startingWord,
      playerScores: upsertPlayerScore(cur.game.playerScores, { id: playerId, name, score }),
    };
    await withStore("update scores", () => kvSetJSON(gameDocPath(threadKey, dateKey), next));
    return next;
  });
}

/**
 * Delivers the current record, then every change, until the returned
 * function is called. Malformed writes arrive as null.
 */
export async function watchGame(
  threadKey: string,
  dateKey: string,
  onChange: (game: GameRecord | null) => void,
  onError?: (err: unknown) => void,
): Promise<Unsubscribe> {
  const unsubscribe = await withStore("watch game", () =>
    kvWatchJSON(gameDocPath(threadKey, dateKey), (raw) => onChange(parseGameRecord(raw)), onError),
  );
  try {
    onChange(await fetchGame(threadKey, dateKey));
  } catch (e) {
    await unsubscribe();
    throw e;
  }
  return unsubscribe;
}

/** Every started game for the thread, newest date first. */
export async function listGames(threadKey: string): Promise<DatedGame[]> {
  const dates = parseIndex(await withStore("read game index", () => kvGetJSON(gameIndexPath(threadKey))));
  const sorted = [...dates].sort().reverse();
  const games = await Promise.all(sorted.map(async (date) => ({ date, game: await fetchGame(threadKey, date) })));
  const out: DatedGame[] = [];
  for (const { date, game } of games) {
    if (game) out.push({ date, game });
  }
  return out;
}
