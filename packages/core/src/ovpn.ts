import { OvpnParseError } from "./errors.js";
import { isIPAddress } from "./ip.js";
import type { ParsedHost } from "./types.js";

export function extractHostFromOvpn(content: string): ParsedHost {
  const hosts = extractRemoteHosts(content);
  const [first, ...others] = hosts;
  if (first === undefined) {
    throw new OvpnParseError("remote host not found");
  }

  if (others.length > 0) {
    return {
      host: first,
      warning: `only using the first host ${JSON.stringify(first)} and discarding ${others.length} other hosts`
    };
  }

  return { host: first };
}

/** Hosts named by `remote` directives, IP literals excluded. */
export function extractRemoteHosts(content: string): string[] {
  const hosts: string[] = [];

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith("#") || line.startsWith(";")) {
      continue;
    }

    const [directive, host] = line.split(/\s+/);
    if (directive !== "remote" || !host || isIPAddress(host)) {
      continue;
    }

    hosts.push(host);
  }

  return hosts;
}
