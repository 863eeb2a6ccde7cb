import type { TransientErrorKind } from "../entities/appError";

export type RetryPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
};

export type RetryPhase = "pending" | "backing_off" | "succeeded" | "exhausted";

/**
 * Attempt bookkeeping for a single record fetch. Transitions are pure; the
 * caller owns the actual waiting so tests can drive it with a fake clock.
 */
export type RetryState = {
  phase: RetryPhase;
  attempts: number;
  cumulativeDelayMs: number;
  delaysMs: number[];
  nextDelayMs: number | null;
  lastErrorKind: TransientErrorKind | null;
};

export const initialRetryState = (): RetryState => ({
  phase: "pending",
  attempts: 0,
  cumulativeDelayMs: 0,
  delaysMs: [],
  nextDelayMs: null,
  lastErrorKind: null,
});

/**
 * Delay scheduled after the given failed attempt (1-based): doubles from the
 * base and is clamped to the cap.
 */
export const backoffDelayMs = (
  policy: RetryPolicy,
  failedAttempt: number,
): number => {
  const exponent = Math.max(0, failedAttempt - 1);
  return Math.min(policy.baseDelayMs * 2 ** exponent, policy.maxDelayMs);
};

export const canAttempt = (state: RetryState): boolean =>
  state.phase === "pending" || state.phase === "backing_off";

export const recordSuccess = (state: RetryState): RetryState => {
  if (!canAttempt(state)) {
    throw new Error(`Cannot record success in terminal phase ${state.phase}.`);
  }

  return {
    ...state,
    phase: "succeeded",
    attempts: state.attempts + 1,
    nextDelayMs: null,
  };
};

export const recordFailure = (
  state: RetryState,
  kind: TransientErrorKind,
  policy: RetryPolicy,
): RetryState => {
  if (!canAttempt(state)) {
    throw new Error(`Cannot record failure in terminal phase ${state.phase}.`);
  }

  const attempts = state.attempts + 1;
  if (attempts >= policy.maxAttempts) {
    return {
      ...state,
      phase: "exhausted",
      attempts,
      nextDelayMs: null,
      lastErrorKind: kind,
    };
  }

  const delay = backoffDelayMs(policy, attempts);
  return {
    phase: "backing_off",
    attempts,
    cumulativeDelayMs: state.cumulativeDelayMs + delay,
    delaysMs: [...state.delaysMs, delay],
    nextDelayMs: delay,
    lastErrorKind: kind,
  };
};
