import type { PollSettings } from "../config";
import { RemoteError } from "../errors";
import type { IndexingStatus } from "../types";

export type IndexingCheck = { status: IndexingStatus };

export type IndexingOutcome<T extends IndexingCheck> =
  | { kind: "completed"; file: T }
  | { kind: "failed"; file: T }
  | { kind: "timed_out"; lastStatus: IndexingStatus; elapsedMs: number };

export type PollOptions = PollSettings & {
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  onStatus?: (status: IndexingStatus) => void;
};

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export const isTransientPollError = (err: unknown) => err instanceof RemoteError && err.retryable;

/**
 * Checks right away, then keeps checking until the file reaches a terminal
 * status or the deadline passes. The wait between checks grows by
 * `backoffFactor` up to `maxIntervalMs` and is cut short at the deadline, where
 * one last check runs before giving up. Each check is told how much of the
 * deadline is left so it can bound its own request.
 */
export const waitForIndexing = async <T extends IndexingCheck>(
  check: (remainingMs: number) => Promise<T>,
  { intervalMs, timeoutMs, backoffFactor, maxIntervalMs, sleep = defaultSleep, now = Date.now, onStatus }: PollOptions,
): Promise<IndexingOutcome<T>> => {
  const startedAt = now();
  let delay = intervalMs;
  let lastStatus: IndexingStatus = "submitted";

  for (;;) {
    try {
      const file = await check(Math.max(0, timeoutMs - (now() - startedAt)));
      lastStatus = file.status;
      onStatus?.(file.status);
      if (file.status === "completed") return { kind: "completed", file };
      if (file.status === "failed") return { kind: "failed", file };
    } catch (err) {
      if (!isTransientPollError(err)) throw err;
    }

    const elapsedMs = now() - startedAt;
    if (elapsedMs >= timeoutMs) {
      return { kind: "timed_out", lastStatus, elapsedMs };
    }
    await sleep(Math.min(delay, timeoutMs - elapsedMs));
    delay = Math.min(delay * backoffFactor, maxIntervalMs);
  }
};
