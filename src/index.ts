import { serve } from "@hono/node-server";
import { setTimeout as sleep } from "node:timers/promises";

import { readBattery } from "./api/read-battery";
import { createApp } from "./app";
import { initialAlertState } from "./model/alert-model";
import { loadConfig, readEnv } from "./utils/load-config";
import { buildNotifiers } from "./utils/notifier";
import { runWatchCycle, type WatchDeps } from "./utils/watch-cycle";

async function main() {
  const config = loadConfig(readEnv());

  const notifiers = buildNotifiers(config);
  const deps: WatchDeps = {
    readBattery,
    notifiers,
    thresholds: {
      lowThreshold: config.lowThreshold,
      highThreshold: config.highThreshold,
    },
    cooldownMs: config.cooldownMs,
    title: config.toast.title,
  };
  const state = initialAlertState();

  if (config.controlPort != null) {
    const app = createApp(state, deps, config.triggerToken);
    serve(
      { fetch: app.fetch, hostname: config.controlHost, port: config.controlPort },
      (info) => {
        console.log(`Control server listening on ${info.address}:${info.port}`);
      },
    );
  }

  const channels = notifiers.map((n) => n.name).join(", ") || "none";
  console.log(`Battery Watcher started... (notifiers: ${channels})`);

  for (;;) {
    await runWatchCycle(state, deps);
    await sleep(config.pollSeconds * 1000);
  }
}

main().catch((err) => {
  console.error("[main] fatal", err);
  process.exit(1);
});
