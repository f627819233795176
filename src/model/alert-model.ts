import type { BatteryReport, BatteryStatus } from "./battery-model";

export type AlertState = {
  lastStatus: BatteryStatus | null;
  lastNotifyAt: number;               // epoch ms
  lastReport: BatteryReport | null;
};

export function initialAlertState(): AlertState {
  return { lastStatus: null, lastNotifyAt: 0, lastReport: null };
}

export type CycleResult = {
  ok: boolean;
  battery: boolean;
  notified: boolean;
  sent: string[];
  status?: BatteryStatus;
  message?: string;
  note?: string;
};
