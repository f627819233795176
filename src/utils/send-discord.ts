import type { Notifier } from "./notifier";

export const DISCORD_TIMEOUT_MS = 10_000;

export async function sendDiscord(
  webhookUrl: string,
  payload: unknown,
  signal?: AbortSignal,
) {
  if (!webhookUrl || webhookUrl.trim() === "") {
    throw new Error("DISCORD_WEBHOOK_URL is missing (undefined/empty)");
  }
  const res = await fetch(webhookUrl, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(payload),
    signal,
  });
  if (!res.ok) throw new Error(`Discord webhook failed: ${res.status}`);
}

export function discordNotifier(webhookUrl: string): Notifier {
  return {
    name: "discord",
    async send(_title, message) {
      try {
        await sendDiscord(
          webhookUrl,
          { content: `🔋 ${message}` },
          AbortSignal.timeout(DISCORD_TIMEOUT_MS),
        );
        return true;
      } catch (err) {
        console.error("[discord] send failed", err);
        return false;
      }
    },
  };
}
