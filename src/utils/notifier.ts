import type { WatcherConfig } from "../model/config-env";
import { discordNotifier } from "./send-discord";
import { telegramNotifier } from "./send-telegram";
import { toastNotifier } from "./send-toast";

export interface Notifier {
  name: string;
  /** Never rejects; false means the message did not go out. */
  send(title: string, message: string): Promise<boolean>;
}

export function buildNotifiers(config: WatcherConfig): Notifier[] {
  const out: Notifier[] = [];

  const { botToken, chatId, apiBase } = config.telegram;
  if (botToken && chatId) out.push(telegramNotifier(botToken, chatId, apiBase));

  if (config.discordWebhookUrl) {
    out.push(discordNotifier(config.discordWebhookUrl));
  }

  if (config.toast.enabled) out.push(toastNotifier());

  return out;
}

// Channels are tried one after another; a failing one does not stop the rest.
export async function notifyAll(
  notifiers: Notifier[],
  title: string,
  message: string,
): Promise<string[]> {
  const sent: string[] = [];
  for (const n of notifiers) {
    if (await n.send(title, message)) {
      sent.push(n.name);
    } else {
      console.error(`[notify] ${n.name} did not deliver`);
    }
  }
  return sent;
}
