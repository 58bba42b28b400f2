import type { Clock } from "./clock.js";
import { RemoteError, errorMessage } from "./errors.js";

export type PollConfig = {
  intervalMs: number;
  timeoutMs: number;
  /** Wait one interval before the first evaluation. */
  delayFirstPoll?: boolean;
};

/**
 * Result of one predicate evaluation.
 * `observed` is what the tick saw (a status token, a revision) and is carried into timeout reports.
 */
export type TickResult<T, F> =
  | { kind: "pending"; observed: string }
  | { kind: "success"; value: T }
  | { kind: "failure"; detail: F };

export type PollResult<T, F> =
  | { kind: "success"; value: T; elapsedMs: number; attempts: number }
  | { kind: "failure"; detail: F; elapsedMs: number; attempts: number }
  | { kind: "rejected"; error: RemoteError; elapsedMs: number; attempts: number }
  | { kind: "timeout"; elapsedMs: number; attempts: number; lastObserved: string }
  | { kind: "cancelled"; elapsedMs: number; attempts: number; lastObserved: string };

export type PollTick = {
  attempt: number;
  elapsedMs: number;
  observed: string;
  /** Set when the tick's remote call failed and was absorbed as non-terminal. */
  error?: string;
};

export type PollOpts = {
  signal?: AbortSignal;
  onTick?: (tick: PollTick) => void;
};

/**
 * Evaluate `predicate` every `intervalMs` until it reports a terminal result or `timeoutMs` has elapsed.
 *
 * The timeout is checked before each evaluation, so with interval 5s and timeout 10s the predicate
 * runs at t=0 and t=5 and the loop times out at t=10. Transport and protocol `RemoteError`s thrown
 * by the predicate count as a pending tick; a `rejected` one ends the loop; anything else propagates.
 */
export async function pollUntil<T, F>(
  predicate: () => Promise<TickResult<T, F>>,
  config: PollConfig,
  clock: Clock,
  opts: PollOpts = {},
): Promise<PollResult<T, F>> {
  const { signal, onTick } = opts;
  const start = clock.now();
  const elapsed = () => clock.now() - start;
  let attempts = 0;
  let lastObserved = "";

  const cancelled = (): PollResult<T, F> => ({ kind: "cancelled", elapsedMs: elapsed(), attempts, lastObserved });

  const wait = async (): Promise<boolean> => {
    try {
      await clock.sleep(config.intervalMs, signal);
      return true;
    } catch (e) {
      if (signal?.aborted) return false;
      throw e;
    }
  };

  if (config.delayFirstPoll && !(await wait())) return cancelled();

  for (;;) {
    if (signal?.aborted) return cancelled();
    if (elapsed() >= config.timeoutMs) {
      return { kind: "timeout", elapsedMs: elapsed(), attempts, lastObserved };
    }

    attempts++;
    let tick: TickResult<T, F>;
    let tickError: string | undefined;
    try {
      tick = await predicate();
    } catch (e) {
      if (!(e instanceof RemoteError)) throw e;
      if (e.kind === "rejected") return { kind: "rejected", error: e, elapsedMs: elapsed(), attempts };
      tickError = errorMessage(e);
      tick = { kind: "pending", observed: lastObserved };
    }

    if (tick.kind === "success") {
      return { kind: "success", value: tick.value, elapsedMs: elapsed(), attempts };
    }
    if (tick.kind === "failure") {
      return { kind: "failure", detail: tick.detail, elapsedMs: elapsed(), attempts };
    }

    lastObserved = tick.observed;
    onTick?.({ attempt: attempts, elapsedMs: elapsed(), observed: lastObserved, error: tickError });

    if (!(await wait())) return cancelled();
  }
}
