import type { MemoryServerStore, UpdateServersResult } from "@serverlist/core";
import { Hono } from "hono";
import { HTTPException } from "hono/http-exception";
import { logger } from "hono/logger";

export interface ServerAppDeps {
  store: MemoryServerStore;
  provider: string;
  /** Pass the same single-flight function the refresh loop uses, so POST and interval runs never overlap. */
  refresh: () => Promise<UpdateServersResult>;
  log?: (message: string) => void;
}

export interface RefreshResponse {
  updated: true;
  timestamp: number;
  servers: number;
  warnings: string[];
}

/** Largest delay Node timers honour; longer ones fire after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export interface RefreshLoop {
  stop(): void;
}

export function createServerApp(deps: ServerAppDeps): Hono {
  const app = new Hono();
  const refreshOnce = singleFlight(deps.refresh);

  app.use(logger(deps.log));

  app.get("/", (c) => {
    const list = deps.store.get();
    return c.json({
      name: "serverlist",
      provider: deps.provider,
      timestamp: list.timestamp,
      servers: list.servers.length
    });
  });

  app.get("/servers", (c) => {
    if (!deps.store.isReady()) {
      return c.json({ ok: false, error: "server list not ready" }, 503);
    }
    return c.json(deps.store.get());
  });

  app.get("/servers/:region", (c) => {
    if (!deps.store.isReady()) {
      return c.json({ ok: false, error: "server list not ready" }, 503);
    }

    const region = c.req.param("region");
    const server = deps.store.findRegion(region);
    if (!server) {
      return c.json({ ok: false, error: `region not found: ${region}` }, 404);
    }
    return c.json(server);
  });

  app.post("/refresh", async (c) => {
    let result: UpdateServersResult;
    try {
      result = await refreshOnce();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return c.json({ ok: false, error: message }, 502);
    }

    const body: RefreshResponse = {
      updated: true,
      timestamp: result.timestamp,
      servers: result.servers.length,
      warnings: result.warnings
    };
    return c.json(body);
  });

  for (const path of ["/", "/servers", "/servers/:region", "/refresh"]) {
    app.all(path, () => {
      throw new HTTPException(405, { message: "method not allowed" });
    });
  }

  app.notFound((c) => c.json({ ok: false, error: "not found" }, 404));

  app.onError((error, c) => {
    if (error instanceof HTTPException) {
      return c.json({ ok: false, error: error.message }, error.status);
    }
    return c.json({ ok: false, error: error.message }, 500);
  });

  return app;
}

/** Runs `refresh` every `intervalMs`; failures go to `onError` and the loop keeps going. */
export function startRefreshLoop(
  refresh: () => Promise<unknown>,
  intervalMs: number,
  onError: (error: unknown) => void
): RefreshLoop {
  if (!Number.isInteger(intervalMs) || intervalMs < 1 || intervalMs > MAX_TIMER_DELAY_MS) {
    throw new RangeError(`refresh interval must be an integer from 1 to ${MAX_TIMER_DELAY_MS} ms, got ${intervalMs}`);
  }

  const run = singleFlight(refresh);
  const timer = setInterval(() => {
    run().catch(onError);
  }, intervalMs);
  timer.unref();

  return {
    stop(): void {
      clearInterval(timer);
    }
  };
}

/** Concurrent callers share the in-flight promise. */
export function singleFlight<T>(task: () => Promise<T>): () => Promise<T> {
  let pending: Promise<T> | null = null;

  return () => {
    if (pending) {
      return pending;
    }

    pending = task().finally(() => {
      pending = null;
    });
    return pending;
  };
}
