export interface Env {
  LOW_THRESHOLD?: string;
  HIGH_THRESHOLD?: string;
  POLL_SECONDS?: string;
  NOTIFY_COOLDOWN_SECONDS?: string;

  TELEGRAM_BOT_TOKEN?: string;
  TELEGRAM_CHAT_ID?: string;
  TELEGRAM_API_BASE?: string;

  DISCORD_WEBHOOK_URL?: string;

  TOAST_ENABLED?: string;
  TOAST_TITLE?: string;

  CONTROL_HOST?: string;
  CONTROL_PORT?: string;
  TRIGGER_TOKEN?: string;
}

export interface WatcherConfig {
  lowThreshold: number;
  highThreshold: number;
  pollSeconds: number;
  cooldownMs: number;

  telegram: { botToken: string; chatId: string; apiBase: string };
  discordWebhookUrl?: string;
  toast: { enabled: boolean; title: string };

  controlHost: string;
  controlPort?: number;
  triggerToken: string;
}
