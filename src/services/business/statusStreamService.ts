/**
 * Status Stream Service
 *
 * Push-with-polling notifier for a single job. The stream reads the same job
 * store the REST endpoints read, so it never reports a transition that was not
 * committed.
 *
 * 1. The current snapshot is emitted immediately; a terminal job ends there.
 * 2. The store is polled every `pollIntervalMs`; a snapshot is emitted when
 *    the status changes or `updated_at` advances.
 * 3. An idle keepalive is emitted every `keepaliveMs` to keep proxies from
 *    closing the connection.
 * 4. The stream ends right after a terminal snapshot, when the job disappears,
 *    or when `signal` aborts (observer disconnected).
 */

import { setTimeout as sleep } from "timers/promises";
import type { Job, JobRepository } from "../../repositories/jobRepository.js";
import { NotFoundError } from "../../utils/errors.js";
import { errorText, truncate } from "../../utils/errorMessages.js";
import { isTerminal } from "./jobStateMachine.js";

export type StatusEvent = { type: "snapshot"; job: Job } | { type: "keepalive" };

export interface WatchOptions {
  pollIntervalMs?: number;
  keepaliveMs?: number;
  signal?: AbortSignal;
}

export const DEFAULT_POLL_INTERVAL_MS = 3_000;
export const DEFAULT_KEEPALIVE_MS = 15_000;

function hasChanged(previous: Job, next: Job): boolean {
  return next.status !== previous.status || Date.parse(next.updated_at) > Date.parse(previous.updated_at);
}

export async function* watchJobStatus(
  jobs: Pick<JobRepository, "get">,
  initial: Job,
  options: WatchOptions = {}
): AsyncGenerator<StatusEvent> {
  const { pollIntervalMs = DEFAULT_POLL_INTERVAL_MS, keepaliveMs = DEFAULT_KEEPALIVE_MS, signal } = options;

  yield { type: "snapshot", job: initial };
  if (isTerminal(initial.status)) {
    return;
  }

  let last = initial;
  let nextPoll = Date.now() + pollIntervalMs;
  let nextKeepalive = Date.now() + keepaliveMs;

  while (!signal?.aborted) {
    const delay = Math.max(0, Math.min(nextPoll, nextKeepalive) - Date.now());
    try {
      await sleep(delay, undefined, { signal });
    } catch (error) {
      if (signal?.aborted) {
        return;
      }
      throw error;
    }

    const now = Date.now();
    if (now >= nextKeepalive) {
      nextKeepalive = now + keepaliveMs;
      yield { type: "keepalive" };
    }
    if (now < nextPoll) {
      continue;
    }
    nextPoll = now + pollIntervalMs;

    let current: Job;
    try {
      current = await jobs.get(last.id);
    } catch (error) {
      if (error instanceof NotFoundError) {
        console.log(`[sse] Job ${last.id} no longer exists, closing stream`);
        return;
      }
      // Transient store failure: keep the observer and try on the next tick.
      console.warn(`[sse] Poll failed for job ${last.id}: ${truncate(errorText(error), 200)}`);
      continue;
    }

    if (!hasChanged(last, current)) {
      continue;
    }
    last = current;
    yield { type: "snapshot", job: current };

    if (isTerminal(current.status)) {
      return;
    }
  }
}
