import type { SCORE_VALUES } from "@/lib/constants";

export type Score = (typeof SCORE_VALUES)[number];

export type PlayerScore = {
  id: string; // stable per-user id, unique within a game
  name: string;
  score: string; // a Score for anything written through the API; older docs may hold other values
};

export type GameRecord = {
  startingWord: string;
  playerScores: PlayerScore[];
};

export type DatedGame = { date: string; game: GameRecord };

export type FetchGameResult =
  | { status: "found"; game: GameRecord }
  | { status: "absent" }
  | { status: "malformed"; raw: unknown };

export type UserProfile = {
  id: string;
  displayName: string;
};

export type ScoreBucket = Score | "other";

export type PlayerStats = {
  name: string;
  totalGames: number;
  distribution: Record<ScoreBucket, number>;
};

export type PlayerStatsRow = PlayerStats & { id: string; average: number | null };

/** Message the host app should drop into the conversation. */
export type ThreadMessage = {
  caption: string;
  subcaption: string;
};

export type ThreadInput = {
  threadKey?: unknown;
  participantIds?: unknown;
  localParticipantId?: unknown;
  remoteParticipantIds?: unknown;
};
