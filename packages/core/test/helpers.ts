import type { LookupFunc, ProviderConfig } from "../src/types.js";

export const DEMO_PROVIDER: ProviderConfig = {
  name: "demo",
  archiveUrl: "https://example.com/configs.zip",
  domainSuffix: ".vpn.test",
  skipFileSuffix: "_tcp.ovpn",
  regionsFile: "unused.json"
};

export interface FakeLookup {
  lookup: LookupFunc;
  calls: string[];
  signals: Map<string, AbortSignal>;
}

/**
 * Answers are consumed one per attempt; the last one repeats. Hosts without
 * answers resolve to nothing. An `Error` entry makes that attempt throw.
 */
export function fakeLookup(answers: Record<string, Array<string[] | Error>>): FakeLookup {
  const calls: string[] = [];
  const signals = new Map<string, AbortSignal>();
  const attempts = new Map<string, number>();

  const lookup: LookupFunc = async (hostname, signal) => {
    calls.push(hostname);
    signals.set(hostname, signal);

    const sequence = answers[hostname] ?? [];
    const attempt = attempts.get(hostname) ?? 0;
    attempts.set(hostname, attempt + 1);

    const answer = sequence[Math.min(attempt, sequence.length - 1)];
    if (answer instanceof Error) {
      throw answer;
    }
    return answer ?? [];
  };

  return { lookup, calls, signals };
}
