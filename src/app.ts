import { Hono, type MiddlewareHandler } from "hono";

import type { AlertState } from "./model/alert-model";
import { notifyAll } from "./utils/notifier";
import { runWatchCycle, type WatchDeps } from "./utils/watch-cycle";

export function createApp(
  state: AlertState,
  deps: WatchDeps,
  triggerToken: string,
) {
  const app = new Hono();

  // an unset token locks every guarded route
  const requireToken: MiddlewareHandler = async (c, next) => {
    const token = c.req.header("x-trigger-token");
    if (!triggerToken || !token || token !== triggerToken) {
      return c.text("Unauthorized", 401);
    }
    await next();
  };

  app.get("/health", (c) => c.json({ ok: true }));

  app.get("/status", (c) =>
    c.json({
      ok: true,
      lastStatus: state.lastStatus,
      lastNotifyAt: state.lastNotifyAt,
      report: state.lastReport,
    }),
  );

  app.get("/test-notify", requireToken, async (c) => {
    const sent = await notifyAll(
      deps.notifiers,
      deps.title,
      "✅ Battery watcher notifications work!",
    );
    return c.json({ ok: sent.length === deps.notifiers.length, sent });
  });

  app.post("/trigger", requireToken, async (c) => {
    // optional body: { force?: boolean }
    const body: unknown = await c.req.json().catch(() => ({}));
    const force =
      typeof body === "object" &&
      body !== null &&
      "force" in body &&
      body.force === true;

    const result = await runWatchCycle(state, deps, { force });
    return c.json(result);
  });

  return app;
}
