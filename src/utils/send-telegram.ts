import { DEFAULT_TELEGRAM_API_BASE } from "./load-config";
import type { Notifier } from "./notifier";

export const TELEGRAM_TIMEOUT_MS = 10_000;

export async function sendTelegram(
  botToken: string,
  chatId: string,
  text: string,
  opts?: { apiBase?: string; timeoutMs?: number },
): Promise<boolean> {
  if (!botToken?.trim() || !chatId?.trim()) return false;

  const base = opts?.apiBase ?? DEFAULT_TELEGRAM_API_BASE;
  const url = `${base}/bot${botToken}/sendMessage`;

  try {
    const res = await fetch(url, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ chat_id: chatId, text }),
      signal: AbortSignal.timeout(opts?.timeoutMs ?? TELEGRAM_TIMEOUT_MS),
    });

    if (!res.ok) {
      const body = await res.text().catch(() => "");
      console.error(`[telegram] HTTP error ${res.status}: ${body}`);
      return false;
    }
    return true;
  } catch (err) {
    console.error("[telegram] send failed", err);
    return false;
  }
}

export function telegramNotifier(
  botToken: string,
  chatId: string,
  apiBase: string = DEFAULT_TELEGRAM_API_BASE,
): Notifier {
  return {
    name: "telegram",
    send: (_title, message) =>
      sendTelegram(botToken, chatId, `🔋 ${message}`, { apiBase }),
  };
}
