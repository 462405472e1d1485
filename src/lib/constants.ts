
export const APP_NAME = "Wordlers";

export const SCORE_VALUES = ["1", "2", "3", "4", "5", "6", "X"] as const;

export const STARTING_WORD_LENGTH = 5;

export const MAX_DISPLAY_NAME_CHARS = 40;

// Participant ids are joined with this before hashing into a thread key.
export const THREAD_ID_DELIMITER = "-";

// Score submissions lock the game doc for their read-modify-write.
export const SCORE_LOCK_TTL_SECONDS = 10;
export const SCORE_LOCK_WAIT_MS = 5_000;
