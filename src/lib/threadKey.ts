import { createHash } from "crypto";
import { THREAD_ID_DELIMITER } from "@/lib/constants";
import { isRecord } from "@/lib/guards";

const THREAD_KEY_RE = /^[0-9a-f]{64}$/;

/**
 * Deterministic key for a conversation: SHA-256 over the sorted, dash-joined
 * participant ids, as lowercase hex. Every member computes the same key, and
 * the ids themselves never reach the store.
 */
export function threadKey(participantIds: Iterable<string>): string {
  const joined = Array.from(new Set(participantIds)).sort().join(THREAD_ID_DELIMITER);
  return createHash("sha256").update(joined, "utf8").digest("hex");
}

export function isThreadKey(value: unknown): value is string {
  return typeof value === "string" && THREAD_KEY_RE.test(value);
}

function stringList(value: unknown): string[] | null {
  if (!Array.isArray(value)) return null;
  const out: string[] = [];
  for (const v of value) {
    if (typeof v !== "string" || !v) return null;
    out.push(v);
  }
  return out;
}

/**
 * Accepts a precomputed `threadKey`, a flat `participantIds` list, or the
 * local id plus the remote ids. Returns null when none of them is usable.
 */
export function resolveThreadKey(input: unknown): string | null {
  if (!isRecord(input)) return null;
  const { threadKey: key, participantIds, localParticipantId, remoteParticipantIds } = input;
  if (key !== undefined) return isThreadKey(key) ? key : null;

  const all = stringList(participantIds);
  if (all) return all.length ? threadKey(all) : null;

  if (typeof localParticipantId === "string" && localParticipantId) {
    const remotes = remoteParticipantIds === undefined ? [] : stringList(remoteParticipantIds);
    if (!remotes) return null;
    return threadKey([localParticipantId, ...remotes]);
  }
  return null;
}
