import { APP_NAME } from "@/lib/constants";
import { formatDisplayDate } from "@/lib/dateKey";
import type { ThreadMessage } from "@/lib/types";

export function buildStartMessage(args: { dateKey: string; startingWord: string; starter: string }): ThreadMessage {
  return {
    caption: `${APP_NAME} Game – ${formatDisplayDate(args.dateKey)}`,
    subcaption: `Starting Word: ${args.startingWord} (by ${args.starter})`,
  };
}
