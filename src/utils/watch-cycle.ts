import type { AlertState, CycleResult } from "../model/alert-model";
import type { BatterySample, Thresholds } from "../model/battery-model";
import { buildReport, formatStatusMessage } from "./battery-status";
import { notifyAll, type Notifier } from "./notifier";

export type WatchDeps = {
  readBattery: () => Promise<BatterySample | null>;
  notifiers: Notifier[];
  thresholds: Thresholds;
  cooldownMs: number;
  title: string;
  now?: () => number;
};

/**
 * One poll: sample, classify, print, and notify when the status changed and
 * the last notification is older than the cooldown. `force` skips both checks.
 */
export async function runWatchCycle(
  state: AlertState,
  deps: WatchDeps,
  opts?: { force?: boolean },
): Promise<CycleResult> {
  let sample: BatterySample | null;
  try {
    sample = await deps.readBattery();
  } catch (err) {
    console.error("[watch] battery read failed", err);
    return { ok: false, battery: false, notified: false, sent: [], note: "error" };
  }

  if (!sample) {
    console.log("No battery detected.");
    return {
      ok: true,
      battery: false,
      notified: false,
      sent: [],
      note: "no battery",
    };
  }

  const report = buildReport(sample, deps.thresholds);
  const message = formatStatusMessage(report);
  console.log(message);

  const now = (deps.now ?? Date.now)();
  const changed = report.status !== state.lastStatus;
  const cooledDown = now - state.lastNotifyAt > deps.cooldownMs;

  const notified = Boolean(opts?.force) || (changed && cooledDown);

  // state is settled before any await so an overlapping cycle sees it
  if (notified) state.lastNotifyAt = now;
  state.lastStatus = report.status;
  state.lastReport = report;

  const sent = notified
    ? await notifyAll(deps.notifiers, deps.title, message)
    : [];

  return { ok: true, battery: true, notified, sent, status: report.status, message };
}
