export type BatteryStatus = "low" | "high" | "normal";

// sentinels for secondsRemaining
export const POWER_TIME_UNKNOWN = -1;
export const POWER_TIME_UNLIMITED = -2;

export type BatterySample = {
  percent: number;                  // 0-100, rounded
  plugged: boolean;
  secondsRemaining: number | null;  // seconds, sentinel, or null when unknown
};

export type BatteryReport = BatterySample & {
  status: BatteryStatus;
  timeText: string;
};

export type Thresholds = {
  lowThreshold: number;
  highThreshold: number;
};
