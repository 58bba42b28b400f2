import { ClassifierContractError } from "./errors.js";

/** Closed set of build outcomes. Downstream logic switches on these, never on raw tokens. */
export type Outcome = "PENDING" | "RUNNING" | "SUCCEEDED" | "FAILED" | "CANCELLED" | "UNKNOWN";

export type TerminalOutcome = Extract<Outcome, "SUCCEEDED" | "FAILED" | "CANCELLED">;

const TOKENS: Record<string, Outcome> = {
  SUCCESS: "SUCCEEDED",
  SUCCEEDED: "SUCCEEDED",
  COMPLETED: "SUCCEEDED",
  FAILED: "FAILED",
  FAILURE: "FAILED",
  ERROR: "FAILED",
  CANCELLED: "CANCELLED",
  CANCELED: "CANCELLED",
  ABORTED: "CANCELLED",
  PENDING: "PENDING",
  QUEUED: "PENDING",
  RUNNING: "RUNNING",
  BUILDING: "RUNNING",
  STARTING: "RUNNING",
  CLONING: "RUNNING",
  UPLOADING: "RUNNING",
  IN_PROGRESS: "RUNNING",
};

/**
 * Map a raw remote status token to an Outcome.
 * `undefined` means the build record is not visible yet; an empty token means the same.
 */
export function classify(rawStatus: string | null | undefined): Outcome {
  if (rawStatus === null || rawStatus === undefined) return "PENDING";
  const token = rawStatus.trim().toUpperCase().replace(/[\s-]+/g, "_");
  if (token === "") return "PENDING";
  return TOKENS[token] ?? "UNKNOWN";
}

export function isTerminalOutcome(outcome: Outcome): outcome is TerminalOutcome {
  return outcome === "SUCCEEDED" || outcome === "FAILED" || outcome === "CANCELLED";
}

/**
 * Remembers the first terminal outcome seen per build handle and rejects any later
 * report that disagrees with it.
 */
export class OutcomeLatch {
  private readonly settled = new Map<string, { outcome: TerminalOutcome; raw: string }>();

  observe(handle: string, rawStatus: string | undefined): Outcome {
    const outcome = classify(rawStatus);
    const prior = this.settled.get(handle);
    if (prior) {
      if (outcome !== prior.outcome) {
        throw new ClassifierContractError(handle, prior.raw, rawStatus ?? "(missing)");
      }
      return outcome;
    }
    if (isTerminalOutcome(outcome)) {
      this.settled.set(handle, { outcome, raw: rawStatus ?? "" });
    }
    return outcome;
  }
}
