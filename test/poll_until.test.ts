import { describe, expect, it } from "vitest";
import { ManualClock, systemClock } from "../src/core/clock.js";
import { RemoteError } from "../src/core/errors.js";
import { pollUntil, type PollTick, type TickResult } from "../src/core/poll-until.js";

const cadence = { intervalMs: 5000, timeoutMs: 10_000 };

function scripted<T, F>(results: Array<TickResult<T, F> | Error>, clock: ManualClock, times: number[]) {
  let i = 0;
  return async (): Promise<TickResult<T, F>> => {
    times.push(clock.now());
    const r = results[Math.min(i++, results.length - 1)];
    if (r instanceof Error) throw r;
    return r;
  };
}

describe("pollUntil", () => {
  it("returns success on the first terminal tick without sleeping", async () => {
    const clock = new ManualClock();
    const times: number[] = [];
    const res = await pollUntil(scripted([{ kind: "success", value: 42 }], clock, times), cadence, clock);
    expect(res).toEqual({ kind: "success", value: 42, elapsedMs: 0, attempts: 1 });
    expect(clock.sleeps).toEqual([]);
  });

  it("returns the failure detail as soon as it is reported", async () => {
    const clock = new ManualClock();
    const times: number[] = [];
    const res = await pollUntil(
      scripted<never, string>([{ kind: "pending", observed: "RUNNING" }, { kind: "failure", detail: "CANCELLED" }], clock, times),
      { intervalMs: 5000, timeoutMs: 60_000 },
      clock,
    );
    expect(res).toEqual({ kind: "failure", detail: "CANCELLED", elapsedMs: 5000, attempts: 2 });
    expect(times).toEqual([0, 5000]);
  });

  it("times out after two ticks when interval is 5s and timeout is 10s", async () => {
    const clock = new ManualClock();
    const times: number[] = [];
    const res = await pollUntil(scripted([{ kind: "pending", observed: "RUNNING" }], clock, times), cadence, clock);
    expect(res).toEqual({ kind: "timeout", elapsedMs: 10_000, attempts: 2, lastObserved: "RUNNING" });
    expect(times).toEqual([0, 5000]);
  });

  it("spaces ticks by at least the interval even when a tick itself takes time", async () => {
    const clock = new ManualClock();
    const times: number[] = [];
    let n = 0;
    const res = await pollUntil(
      async (): Promise<TickResult<string, never>> => {
        times.push(clock.now());
        clock.advance(2000);
        n++;
        return n < 4 ? { kind: "pending", observed: "RUNNING" } : { kind: "success", value: "done" };
      },
      { intervalMs: 5000, timeoutMs: 120_000 },
      clock,
    );
    expect(res.kind).toBe("success");
    expect(times).toEqual([0, 7000, 14_000, 21_000]);
    for (let i = 1; i < times.length; i++) expect(times[i] - times[i - 1]).toBeGreaterThanOrEqual(5000);
  });

  it("absorbs RemoteError as a pending tick and keeps the last observation", async () => {
    const clock = new ManualClock();
    const times: number[] = [];
    const ticks: PollTick[] = [];
    const res = await pollUntil(
      scripted<never, never>(
        [{ kind: "pending", observed: "QUEUED" }, new RemoteError("connection reset", "transport")],
        clock,
        times,
      ),
      { intervalMs: 5000, timeoutMs: 15_000 },
      clock,
      { onTick: (t) => ticks.push(t) },
    );
    expect(res).toEqual({ kind: "timeout", elapsedMs: 15_000, attempts: 3, lastObserved: "QUEUED" });
    expect(ticks).toEqual([
      { attempt: 1, elapsedMs: 0, observed: "QUEUED", error: undefined },
      { attempt: 2, elapsedMs: 5000, observed: "QUEUED", error: "connection reset" },
      { attempt: 3, elapsedMs: 10_000, observed: "QUEUED", error: "connection reset" },
    ]);
  });

  it("ends with the error when the remote side rejects the call", async () => {
    const clock = new ManualClock();
    const times: number[] = [];
    const rejected = new RemoteError("forbidden", "rejected");
    const res = await pollUntil(
      scripted<never, never>([{ kind: "pending", observed: "QUEUED" }, rejected], clock, times),
      { intervalMs: 5000, timeoutMs: 900_000 },
      clock,
    );
    expect(res).toEqual({ kind: "rejected", error: rejected, elapsedMs: 5000, attempts: 2 });
    expect(times).toEqual([0, 5000]);
  });

  it("absorbs protocol errors like transport ones", async () => {
    const clock = new ManualClock();
    const times: number[] = [];
    const res = await pollUntil(
      scripted<boolean, never>([new RemoteError("output is not JSON", "protocol"), { kind: "success", value: true }], clock, times),
      cadence,
      clock,
    );
    expect(res).toEqual({ kind: "success", value: true, elapsedMs: 5000, attempts: 2 });
  });

  it("propagates errors that are not RemoteError", async () => {
    const clock = new ManualClock();
    const times: number[] = [];
    await expect(pollUntil(scripted([new TypeError("bad predicate")], clock, times), cadence, clock)).rejects.toThrow(
      "bad predicate",
    );
  });

  it("waits one interval before the first tick when delayFirstPoll is set", async () => {
    const clock = new ManualClock(1000);
    const times: number[] = [];
    const res = await pollUntil(
      scripted([{ kind: "success", value: true }], clock, times),
      { ...cadence, delayFirstPoll: true },
      clock,
    );
    expect(times).toEqual([6000]);
    expect(res).toEqual({ kind: "success", value: true, elapsedMs: 5000, attempts: 1 });
  });

  it("returns cancelled without ticking when the signal is already aborted", async () => {
    const clock = new ManualClock();
    const times: number[] = [];
    const controller = new AbortController();
    controller.abort();
    const res = await pollUntil(scripted([{ kind: "success", value: 1 }], clock, times), cadence, clock, {
      signal: controller.signal,
    });
    expect(res).toEqual({ kind: "cancelled", elapsedMs: 0, attempts: 0, lastObserved: "" });
    expect(times).toEqual([]);
  });

  it("stops between ticks once the signal aborts", async () => {
    const clock = new ManualClock();
    const controller = new AbortController();
    let n = 0;
    const res = await pollUntil(
      async (): Promise<TickResult<never, never>> => {
        n++;
        if (n === 2) controller.abort();
        return { kind: "pending", observed: `tick-${n}` };
      },
      { intervalMs: 5000, timeoutMs: 60_000 },
      clock,
      { signal: controller.signal },
    );
    expect(res).toEqual({ kind: "cancelled", elapsedMs: 5000, attempts: 2, lastObserved: "tick-2" });
  });
});

describe("systemClock", () => {
  it("sleeps for real and reports monotonic time", async () => {
    const before = systemClock.now();
    await systemClock.sleep(5);
    expect(systemClock.now()).toBeGreaterThan(before);
  });

  it("rejects a sleep when the signal aborts", async () => {
    const controller = new AbortController();
    const pending = systemClock.sleep(60_000, controller.signal);
    controller.abort(new Error("stop"));
    await expect(pending).rejects.toThrow("stop");
  });
});
