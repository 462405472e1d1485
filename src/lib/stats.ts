import { SCORE_VALUES } from "@/lib/constants";
import { parsePlayerScore } from "@/lib/game";
import { isRecord } from "@/lib/guards";
import type { PlayerStats, PlayerStatsRow, Score, ScoreBucket } from "@/lib/types";

function isScore(value: string): value is Score {
  return SCORE_VALUES.some((v) => v === value);
}

export function emptyDistribution(): Record<ScoreBucket, number> {
  return { "1": 0, "2": 0, "3": 0, "4": 0, "5": 0, "6": 0, X: 0, other: 0 };
}

/**
 * Per-player totals over any pile of game docs. Nothing here throws on bad
 * data: docs without a `playerScores` array and entries missing a field are
 * skipped. The latest name seen for an id wins, whatever the dates.
 */
export function aggregatePlayerStats(records: Iterable<unknown>): Record<string, PlayerStats> {
  // Keyed by raw player id, which may be "constructor" or "__proto__".
  const stats = new Map<string, PlayerStats>();

  for (const record of records) {
    const players = isRecord(record) ? record.playerScores : null;
    if (!Array.isArray(players)) continue;

    for (const raw of players) {
      const player = parsePlayerScore(raw);
      if (!player) continue;
      const entry = stats.get(player.id) ?? { name: player.name, totalGames: 0, distribution: emptyDistribution() };
      entry.name = player.name;
      entry.totalGames += 1;
      entry.distribution[isScore(player.score) ? player.score : "other"] += 1;
      stats.set(player.id, entry);
    }
  }

  return Object.fromEntries(stats);
}

/** Mean guesses over solved games only. */
export function averageScore(stats: PlayerStats): number | null {
  let solved = 0;
  let guesses = 0;
  for (const score of SCORE_VALUES) {
    if (score === "X") continue;
    const n = stats.distribution[score];
    solved += n;
    guesses += n * Number(score);
  }
  if (!solved) return null;
  return Math.round((guesses / solved) * 100) / 100;
}

export function sortPlayerStats(stats: Record<string, PlayerStats>): PlayerStatsRow[] {
  return Object.entries(stats)
    .map(([id, s]) => ({ id, ...s, average: averageScore(s) }))
    .sort((a, b) => a.name.localeCompare(b.name) || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
}
