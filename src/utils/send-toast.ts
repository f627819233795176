import notifier from "node-notifier";

import type { Notifier } from "./notifier";

export function sendToast(title: string, message: string): Promise<void> {
  return new Promise((resolve, reject) => {
    notifier.notify({ title, message }, (err) => {
      if (err) reject(err);
      else resolve();
    });
  });
}

export function toastNotifier(): Notifier {
  return {
    name: "toast",
    async send(title, message) {
      try {
        await sendToast(title, message);
        return true;
      } catch (err) {
        console.error("[toast] failed", err);
        return false;
      }
    },
  };
}
