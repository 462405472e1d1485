import { watchGame } from "@/lib/game";
import type { Unsubscribe } from "@/lib/storage";
import type { GameRecord } from "@/lib/types";

export type GameWatcherListener = (dateKey: string, game: GameRecord | null) => void;

/**
 * Follows one displayed date at a time for a thread. Switching dates cancels
 * the old subscription before the new one opens, and late updates for a date
 * that is no longer shown are dropped.
 */
export class GameWatcher {
  private current: { dateKey: string; unsubscribe: Unsubscribe } | null = null;
  private generation = 0;

  constructor(
    private readonly threadKey: string,
    private readonly listener: GameWatcherListener,
    private readonly onError?: (err: unknown) => void,
  ) {}

  get dateKey(): string | null {
    return this.current?.dateKey ?? null;
  }

  async show(dateKey: string): Promise<void> {
    const gen = ++this.generation;
    await this.cancelCurrent();
    if (gen !== this.generation) return;

    const unsubscribe = await watchGame(
      this.threadKey,
      dateKey,
      (game) => {
        if (gen === this.generation) this.listener(dateKey, game);
      },
      this.onError,
    );

    // show() or stop() was called again while we were subscribing.
    if (gen !== this.generation) {
      await unsubscribe();
      return;
    }
    this.current = { dateKey, unsubscribe };
  }

  async stop(): Promise<void> {
    this.generation++;
    await this.cancelCurrent();
  }

  private async cancelCurrent(): Promise<void> {
    const cur = this.current;
    this.current = null;
    if (cur) await cur.unsubscribe();
  }
}
