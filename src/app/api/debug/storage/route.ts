import { NextResponse } from "next/server";
import { todayDateKey } from "@/lib/dateKey";
import { gameDocPath } from "@/lib/docPaths";
import { activeBackend, watchPollIntervalMs } from "@/lib/storage";

export const runtime = "nodejs";

// Scheme, host and port only: Redis URLs carry the password in the userinfo part.
function describeEndpoint(raw: string | undefined): string | null {
  if (!raw) return null;
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    return "[set, not a URL]";
  }
  return `${url.protocol}//${url.hostname}${url.port ? `:${url.port}` : ""}`;
}

function describeToken(raw: string | undefined): string | null {
  return raw ? `[set, ${raw.length} chars]` : null;
}

export async function GET() {
  const date = todayDateKey();
  return NextResponse.json({
    ok: true,
    now: new Date().toISOString(),
    date,
    backend: activeBackend(),
    watchPollMs: watchPollIntervalMs(),
    examplePath: gameDocPath("<threadKey>", date),
    env: {
      KV_REST_API_URL: describeEndpoint(process.env.KV_REST_API_URL),
      KV_REST_API_TOKEN: describeToken(process.env.KV_REST_API_TOKEN),
      REDIS_URL: describeEndpoint(process.env.REDIS_URL),
    },
  });
}
