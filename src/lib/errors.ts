
export class StoreUnavailableError extends Error {
  constructor(message: string, opts?: { cause?: unknown }) {
    super(message, { cause: opts?.cause });
    this.name = "StoreUnavailableError";
  }
}

export class GameNotStartedError extends Error {
  constructor(public readonly threadKey: string, public readonly dateKey: string) {
    super(`No game has been started for ${dateKey}.`);
    this.name = "GameNotStartedError";
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export function errorMessage(e: unknown, fallback: string): string {
  return e instanceof Error && e.message ? e.message : fallback;
}
