import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { initialAlertState, type AlertState } from "../model/alert-model";
import type { BatterySample } from "../model/battery-model";
import type { Notifier } from "./notifier";
import { runWatchCycle, type WatchDeps } from "./watch-cycle";

function setup(samples: Array<BatterySample | null>) {
  let clock = 1_700_000_000_000;
  const send = vi.fn<Notifier["send"]>(async () => true);
  const readBattery = vi.fn(async () => samples.shift() ?? null);

  const deps: WatchDeps = {
    readBattery,
    notifiers: [{ name: "chat", send }],
    thresholds: { lowThreshold: 20, highThreshold: 85 },
    cooldownMs: 10_000,
    title: "Battery Watcher",
    now: () => clock,
  };
  const state: AlertState = initialAlertState();
  const advance = (ms: number) => {
    clock += ms;
  };
  return { deps, state, send, readBattery, advance };
}

const low: BatterySample = { percent: 15, plugged: false, secondsRemaining: 3661 };
const high: BatterySample = { percent: 90, plugged: true, secondsRemaining: -2 };
const normal: BatterySample = { percent: 50, plugged: true, secondsRemaining: -2 };

describe("runWatchCycle", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("notifies on the first sample", async () => {
    const { deps, state, send } = setup([low]);

    const result = await runWatchCycle(state, deps);

    const message = "Battery LOW — 15% (plugged: False) — 1:01:01";
    expect(console.log).toHaveBeenCalledWith(message);
    expect(send).toHaveBeenCalledWith("Battery Watcher", message);
    expect(result).toEqual({
      ok: true,
      battery: true,
      notified: true,
      sent: ["chat"],
      status: "low",
      message,
    });
    expect(state.lastStatus).toBe("low");
    expect(state.lastNotifyAt).toBe(1_700_000_000_000);
    expect(state.lastReport?.timeText).toBe("1:01:01");
  });

  it("stays quiet while the status does not change", async () => {
    const { deps, state, send, advance } = setup([low, low]);

    await runWatchCycle(state, deps);
    advance(3_600_000);
    const second = await runWatchCycle(state, deps);

    expect(second.notified).toBe(false);
    expect(send).toHaveBeenCalledTimes(1);
  });

  it("holds back a change inside the cooldown", async () => {
    const { deps, state, send, advance } = setup([low, normal, normal]);

    await runWatchCycle(state, deps);
    advance(5_000);
    const second = await runWatchCycle(state, deps);
    expect(second.notified).toBe(false);
    expect(state.lastStatus).toBe("normal");

    // the change was already recorded, so the next cycle is not a change
    advance(60_000);
    const third = await runWatchCycle(state, deps);
    expect(third.notified).toBe(false);
    expect(send).toHaveBeenCalledTimes(1);
  });

  it("requires strictly more than the cooldown", async () => {
    const { deps, state, send, advance } = setup([low, high, normal]);

    await runWatchCycle(state, deps);
    advance(10_000);
    expect((await runWatchCycle(state, deps)).notified).toBe(false);
    advance(1);
    expect((await runWatchCycle(state, deps)).notified).toBe(true);
    expect(send).toHaveBeenCalledTimes(2);
    expect(state.lastNotifyAt).toBe(1_700_000_010_001);
  });

  it("skips the cycle when there is no battery", async () => {
    const { deps, state, send } = setup([null]);

    const result = await runWatchCycle(state, deps);

    expect(result).toEqual({
      ok: true,
      battery: false,
      notified: false,
      sent: [],
      note: "no battery",
    });
    expect(console.log).toHaveBeenCalledWith("No battery detected.");
    expect(send).not.toHaveBeenCalled();
    expect(state).toEqual(initialAlertState());
  });

  it("keeps the previous status across a cycle without battery", async () => {
    const { deps, state, send } = setup([low, null, low]);

    await runWatchCycle(state, deps);
    await runWatchCycle(state, deps);
    expect(state.lastStatus).toBe("low");
    await runWatchCycle(state, deps);

    expect(send).toHaveBeenCalledTimes(1);
  });

  it("contains a failing battery read", async () => {
    const { deps, state } = setup([]);
    const err = new Error("sensor unavailable");
    deps.readBattery = async () => {
      throw err;
    };

    const result = await runWatchCycle(state, deps);

    expect(result.ok).toBe(false);
    expect(result.note).toBe("error");
    expect(console.error).toHaveBeenCalledWith("[watch] battery read failed", err);
    expect(state.lastStatus).toBeNull();
  });

  it("records the notification even when no channel delivered", async () => {
    const { deps, state, send } = setup([low]);
    send.mockResolvedValue(false);

    const result = await runWatchCycle(state, deps);

    expect(result.notified).toBe(true);
    expect(result.sent).toEqual([]);
    expect(state.lastNotifyAt).toBe(1_700_000_000_000);
  });

  it("sends a change once when two cycles overlap", async () => {
    const { deps, state, send } = setup([low, low]);
    send.mockImplementation(
      () => new Promise((resolve) => setTimeout(() => resolve(true), 20)),
    );

    const [first, second] = await Promise.all([
      runWatchCycle(state, deps),
      runWatchCycle(state, deps),
    ]);

    expect(first.notified).toBe(true);
    expect(second.notified).toBe(false);
    expect(send).toHaveBeenCalledTimes(1);
  });

  it("sends regardless of status and cooldown when forced", async () => {
    const { deps, state, send } = setup([low, low]);

    await runWatchCycle(state, deps);
    const forced = await runWatchCycle(state, deps, { force: true });

    expect(forced.notified).toBe(true);
    expect(send).toHaveBeenCalledTimes(2);
  });
});
