import { NextResponse } from "next/server";
import {
  MAX_DISPLAY_NAME_CHARS,
  SCORE_VALUES,
  STARTING_WORD_LENGTH,
} from "@/lib/constants";
import { isDateKey, todayDateKey } from "@/lib/dateKey";
import { GameNotStartedError, StoreUnavailableError, ValidationError, errorMessage } from "@/lib/errors";
import { isRecord } from "@/lib/guards";
import { resolveThreadKey } from "@/lib/threadKey";
import type { Score, UserProfile } from "@/lib/types";

export async function readBody(req: Request): Promise<Record<string, unknown>> {
  let body: unknown;
  try {
    body = await req.json();
  } catch {
    throw new ValidationError("Request body must be JSON");
  }
  if (!isRecord(body)) throw new ValidationError("Request body must be a JSON object");
  return body;
}

export function requireThreadKey(thread: unknown): string {
  const key = resolveThreadKey(thread);
  if (!key) throw new ValidationError("Missing thread: pass a threadKey or the participant ids");
  return key;
}

export function requireDateKey(date: unknown): string {
  if (date === undefined || date === null || date === "") return todayDateKey();
  if (!isDateKey(date)) throw new ValidationError("Invalid date. Use YYYY-MM-DD");
  return date;
}

export function requireStartingWord(word: unknown): string {
  const upper = String(word ?? "").trim().toUpperCase();
  if (upper.length !== STARTING_WORD_LENGTH || !/^[A-Z]+$/.test(upper)) {
    throw new ValidationError(`Starting word must be exactly ${STARTING_WORD_LENGTH} letters`);
  }
  return upper;
}

export function requireProfile(profile: unknown): UserProfile {
  if (!isRecord(profile)) throw new ValidationError("Missing profile");
  const id = String(profile.id ?? "").trim();
  const displayName = String(profile.displayName ?? "").trim();
  if (!id) throw new ValidationError("Missing profile.id");
  if (!displayName) throw new ValidationError("Missing profile.displayName");
  if (displayName.length > MAX_DISPLAY_NAME_CHARS) {
    throw new ValidationError(`Display name must be at most ${MAX_DISPLAY_NAME_CHARS} characters`);
  }
  return { id, displayName };
}

export function requireScore(score: unknown): Score {
  const s = String(score ?? "").trim().toUpperCase();
  const match = SCORE_VALUES.find((v) => v === s);
  if (!match) throw new ValidationError(`Score must be one of ${SCORE_VALUES.join(", ")}`);
  return match;
}

export function errorResponse(route: string, e: unknown, fallback: string) {
  if (e instanceof ValidationError) {
    return NextResponse.json({ error: e.message }, { status: 400 });
  }
  if (e instanceof GameNotStartedError) {
    return NextResponse.json({ error: e.message }, { status: 409 });
  }
  console.error(`Error in ${route}:`, e);
  const status = e instanceof StoreUnavailableError ? 503 : 500;
  return NextResponse.json({ error: errorMessage(e, fallback) }, { status });
}
