/**
 * Polling retrier: re-reads a location until the server reports it ready.
 *
 * 200 means ready, 202 means "accepted, still processing" and costs one
 * attempt. Anything else fails immediately.
 */
import { setTimeout as sleep } from "node:timers/promises";

import { componentLogger } from "../log.js";
import type { Transport } from "../transport/backend.js";
import { HttpStatusError, PollingTimeoutError } from "./exceptions.js";
import type { PollingOptions } from "./types.js";

export const DEFAULT_POLLING: PollingOptions = {
  maxAttempts: 10,
  delayMs: 5_000,
};

const logger = componentLogger("retrier");

export async function pollUntilReady(
  transport: Transport,
  location: string,
  opts: PollingOptions = DEFAULT_POLLING,
): Promise<Response> {
  const { maxAttempts, delayMs, signal } = opts;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    signal?.throwIfAborted();
    const response = await transport.GET(location, { signal });

    if (response.status === 200) {
      return response;
    }
    if (response.status !== 202) {
      throw new HttpStatusError(response.status, location, await response.text());
    }

    logger.debug("{location} not ready (attempt {attempt}/{maxAttempts})", {
      location,
      attempt,
      maxAttempts,
    });
    if (attempt < maxAttempts) {
      await wait(delayMs, signal);
    }
  }

  throw new PollingTimeoutError(location, maxAttempts);
}

/** Sleep for `ms`, rejecting with the signal's reason if it aborts first. */
export async function wait(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) {
    signal?.throwIfAborted();
    return;
  }
  try {
    await sleep(ms, undefined, { signal });
  } catch (err) {
    if (signal?.aborted) throw signal.reason;
    throw err;
  }
}
