import type {
  BatteryReport,
  BatterySample,
  BatteryStatus,
  Thresholds,
} from "../model/battery-model";

const ONE_WEEK_SECONDS = 60 * 60 * 24 * 7;

export const DEFAULT_THRESHOLDS: Thresholds = {
  lowThreshold: 20,
  highThreshold: 85,
};

export function secsToHms(secs: number | null | undefined): string {
  // negative values are the unknown/unlimited sentinels
  if (secs == null || !Number.isFinite(secs) || secs < 0) return "unknown";

  // some drivers report absurd estimates
  if (secs > ONE_WEEK_SECONDS) return "no driver estimate";

  const total = Math.floor(secs);
  const hh = Math.floor(total / 3600);
  const mm = Math.floor((total % 3600) / 60);
  const ss = total % 60;
  return `${hh}:${String(mm).padStart(2, "0")}:${String(ss).padStart(2, "0")}`;
}

export function classifyBattery(
  sample: Pick<BatterySample, "percent" | "plugged">,
  thresholds: Thresholds = DEFAULT_THRESHOLDS,
): BatteryStatus {
  if (!sample.plugged && sample.percent <= thresholds.lowThreshold) return "low";
  if (sample.plugged && sample.percent >= thresholds.highThreshold) return "high";
  return "normal";
}

export function buildReport(
  sample: BatterySample,
  thresholds: Thresholds = DEFAULT_THRESHOLDS,
): BatteryReport {
  return {
    ...sample,
    status: classifyBattery(sample, thresholds),
    timeText: secsToHms(sample.secondsRemaining),
  };
}

export function formatStatusMessage(report: BatteryReport): string {
  const plugged = report.plugged ? "True" : "False";
  return (
    `Battery ${report.status.toUpperCase()} — ` +
    `${report.percent}% ` +
    `(plugged: ${plugged}) — ` +
    `${report.timeText}`
  );
}
