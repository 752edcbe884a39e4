import { Resolver } from "node:dns/promises";

import type { LookupFunc } from "./types.js";

export interface DnsLookupOptions {
  servers?: string[];
  timeout?: number;
  tries?: number;
}

const NO_RECORD_CODES = new Set(["ENODATA", "ENOTFOUND"]);

/** Single-shot A + AAAA query; a family without records contributes nothing. */
export function createDnsLookup(options: DnsLookupOptions = {}): LookupFunc {
  return async (hostname: string, signal: AbortSignal): Promise<string[]> => {
    const resolver = new Resolver({
      ...(options.timeout !== undefined ? { timeout: options.timeout } : {}),
      ...(options.tries !== undefined ? { tries: options.tries } : {})
    });
    if (options.servers && options.servers.length > 0) {
      resolver.setServers(options.servers);
    }

    const onAbort = (): void => resolver.cancel();
    signal.addEventListener("abort", onAbort, { once: true });

    try {
      const [v4, v6] = await Promise.allSettled([resolver.resolve4(hostname), resolver.resolve6(hostname)]);
      const ips: string[] = [];
      const failures: unknown[] = [];

      for (const outcome of [v4, v6]) {
        if (outcome.status === "fulfilled") {
          ips.push(...outcome.value);
        } else if (!isNoRecordError(outcome.reason)) {
          failures.push(outcome.reason);
        }
      }

      if (failures.length === 2) {
        throw failures[0];
      }

      return ips;
    } finally {
      signal.removeEventListener("abort", onAbort);
    }
  };
}

function isNoRecordError(error: unknown): boolean {
  return error instanceof Error && "code" in error && typeof error.code === "string" && NO_RECORD_CODES.has(error.code);
}
