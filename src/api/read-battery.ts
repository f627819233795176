import * as si from "systeminformation";

import {
  POWER_TIME_UNKNOWN,
  POWER_TIME_UNLIMITED,
  type BatterySample,
} from "../model/battery-model";

/**
 * Reads the host battery. Resolves to null on machines without one.
 *
 * systeminformation reports the remaining time in minutes and uses -1 (or
 * null on some platforms) when the OS has no estimate.
 */
export async function readBattery(): Promise<BatterySample | null> {
  const bat = await si.battery();
  if (!bat.hasBattery) return null;

  const percent = Math.min(100, Math.max(0, Math.round(bat.percent)));
  const plugged = Boolean(bat.acConnected);

  let secondsRemaining: number;
  if (plugged) {
    secondsRemaining = POWER_TIME_UNLIMITED;
  } else if (
    typeof bat.timeRemaining !== "number" ||
    !Number.isFinite(bat.timeRemaining) ||
    bat.timeRemaining < 0
  ) {
    secondsRemaining = POWER_TIME_UNKNOWN;
  } else {
    secondsRemaining = Math.round(bat.timeRemaining * 60);
  }

  return { percent, plugged, secondsRemaining };
}
