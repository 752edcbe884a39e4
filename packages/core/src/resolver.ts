import { setTimeout as sleep } from "node:timers/promises";

import { ResolutionCancelledError, ResolutionExhaustedError } from "./errors.js";
import { uniqueSortedIPs } from "./ip.js";
import type { LookupFunc, ParallelResolveOptions, ParallelResolveResult } from "./types.js";

interface HostSlot {
  host: string;
  ips: string[];
}

/**
 * Resolves every host concurrently, each with up to `repetition` attempts
 * spaced by `timeBetween` milliseconds. Every task owns one slot and the
 * mapping is only assembled once all tasks have settled.
 */
export async function parallelResolve(hosts: string[], options: ParallelResolveOptions): Promise<ParallelResolveResult> {
  const { lookup, repetition, timeBetween, failOnErr, signal } = options;
  if (!Number.isInteger(repetition) || repetition < 1) {
    throw new RangeError(`repetition must be a positive integer, got ${repetition}`);
  }

  throwIfCancelled(signal);

  const uniqueHosts = Array.from(new Set(hosts));
  const batch = new AbortController();
  const onAbort = (): void => batch.abort();
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    const settled = await Promise.allSettled(
      uniqueHosts.map(async (host): Promise<HostSlot> => {
        const ips = await resolveRepeat(host, lookup, repetition, timeBetween, batch.signal);
        if (ips.length === 0 && failOnErr) {
          batch.abort();
        }
        return { host, ips };
      })
    );

    if (signal?.aborted) {
      throw new ResolutionCancelledError();
    }

    const hostToIPs = new Map<string, string[]>();
    const warnings: string[] = [];
    let exhausted: HostSlot | undefined;

    for (const outcome of settled) {
      if (outcome.status === "rejected") {
        if (outcome.reason instanceof ResolutionCancelledError) {
          continue;
        }
        throw outcome.reason;
      }

      const slot = outcome.value;
      if (slot.ips.length === 0) {
        warnings.push(`no IP address found for host ${JSON.stringify(slot.host)}`);
        if (!exhausted) {
          exhausted = slot;
        }
      }
      hostToIPs.set(slot.host, slot.ips);
    }

    if (failOnErr && exhausted) {
      throw new ResolutionExhaustedError(exhausted.host, repetition, warnings);
    }

    return { hostToIPs, warnings };
  } finally {
    signal?.removeEventListener("abort", onAbort);
  }
}

/** Stops at the first attempt that yields addresses; a thrown lookup counts as an empty attempt. */
export async function resolveRepeat(
  host: string,
  lookup: LookupFunc,
  repetition: number,
  timeBetween: number,
  signal: AbortSignal
): Promise<string[]> {
  for (let attempt = 1; attempt <= repetition; attempt += 1) {
    throwIfCancelled(signal);

    const ips = await attemptLookup(host, lookup, signal);
    if (ips.length > 0) {
      return ips;
    }

    if (attempt < repetition) {
      await delay(timeBetween, signal);
    }
  }

  return [];
}

async function attemptLookup(host: string, lookup: LookupFunc, signal: AbortSignal): Promise<string[]> {
  let answer: string[];
  try {
    answer = await raceAbort(lookup(host, signal), signal);
  } catch (error) {
    if (error instanceof ResolutionCancelledError) {
      throw error;
    }
    return [];
  }
  return uniqueSortedIPs(answer);
}

async function delay(ms: number, signal: AbortSignal): Promise<void> {
  if (ms <= 0) {
    return;
  }

  try {
    await sleep(ms, undefined, { signal });
  } catch {
    throw new ResolutionCancelledError();
  }
}

function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    promise.catch(() => undefined);
    return Promise.reject(new ResolutionCancelledError());
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new ResolutionCancelledError());
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new ResolutionCancelledError();
  }
}
