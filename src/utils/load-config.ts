import * as dotenv from "dotenv";

import type { Env, WatcherConfig } from "../model/config-env";

export const DEFAULT_TELEGRAM_API_BASE = "https://api.telegram.org";

function intOr(
  raw: string | undefined,
  fallback: number,
  valid: (n: number) => boolean,
): number {
  if (raw == null || raw.trim() === "") return fallback;
  const num = Number(raw.trim());
  return Number.isInteger(num) && valid(num) ? num : fallback;
}

function flag(raw: string | undefined, fallback: boolean): boolean {
  if (raw == null || raw.trim() === "") return fallback;
  return !["false", "0", "no", "off"].includes(raw.trim().toLowerCase());
}

const isPercent = (n: number) => n >= 0 && n <= 100;
const isPositive = (n: number) => n > 0;

export function loadConfig(env: Env): WatcherConfig {
  const lowThreshold = intOr(env.LOW_THRESHOLD, 20, isPercent);
  const highThreshold = intOr(env.HIGH_THRESHOLD, 85, isPercent);
  if (lowThreshold >= highThreshold) {
    throw new Error(
      `LOW_THRESHOLD (${lowThreshold}) must be below HIGH_THRESHOLD (${highThreshold})`,
    );
  }

  const portRaw = env.CONTROL_PORT?.trim();
  const controlPort = portRaw
    ? intOr(portRaw, -1, (n) => n > 0 && n < 65536)
    : undefined;
  if (controlPort === -1) {
    throw new Error(`CONTROL_PORT is not a valid port: ${portRaw}`);
  }

  const webhook = env.DISCORD_WEBHOOK_URL?.trim();

  return {
    lowThreshold,
    highThreshold,
    pollSeconds: intOr(env.POLL_SECONDS, 60, isPositive),
    cooldownMs: intOr(env.NOTIFY_COOLDOWN_SECONDS, 10, (n) => n >= 0) * 1000,
    telegram: {
      botToken: env.TELEGRAM_BOT_TOKEN?.trim() ?? "",
      chatId: env.TELEGRAM_CHAT_ID?.trim() ?? "",
      apiBase: (env.TELEGRAM_API_BASE?.trim() || DEFAULT_TELEGRAM_API_BASE)
        .replace(/\/+$/, ""),
    },
    discordWebhookUrl: webhook ? webhook : undefined,
    toast: {
      enabled: flag(env.TOAST_ENABLED, true),
      title: env.TOAST_TITLE?.trim() || "Battery Watcher",
    },
    controlHost: env.CONTROL_HOST?.trim() || "127.0.0.1",
    controlPort,
    triggerToken: env.TRIGGER_TOKEN?.trim() ?? "",
  };
}

/** Loads `path` into process.env (set variables win) and returns it. */
export function readEnv(path = ".env"): Env {
  const { error } = dotenv.config({ path });
  if (error && "code" in error && error.code !== "ENOENT") {
    throw new Error(`Failed to read ${path}: ${error.message}`);
  }
  return process.env;
}
