import { fetchArchive } from "./archive.js";
import { ResolutionExhaustedError, ServerUpdateError } from "./errors.js";
import { extractHostsFromContents } from "./extractor.js";
import { uniqueSortedIPs } from "./ip.js";
import { parallelResolve } from "./resolver.js";
import type { FetchArchiveDeps, FindServersDeps, FindServersResult, LookupFunc, Server } from "./types.js";

export const DEFAULT_REPETITION = 20;
export const DEFAULT_TIME_BETWEEN = 1000;

export interface ResolveSettings {
  lookup: LookupFunc;
  repetition: number;
  timeBetween: number;
  signal?: AbortSignal;
}

export async function findServersFromArchive(
  url: string,
  deps: FindServersDeps & FetchArchiveDeps
): Promise<FindServersResult> {
  const contents = await fetchArchive(url, deps);
  return findServersFromContents(contents, deps);
}

/**
 * Archive hosts are resolved strictly and named through the region table;
 * table codes the archive never mentioned get a second, best-effort pass.
 */
export async function findServersFromContents(
  contents: Record<string, string>,
  deps: FindServersDeps
): Promise<FindServersResult> {
  const { provider, table } = deps;
  const settings: ResolveSettings = {
    lookup: deps.lookup,
    repetition: deps.repetition ?? DEFAULT_REPETITION,
    timeBetween: deps.timeBetween ?? DEFAULT_TIME_BETWEEN,
    ...(deps.signal ? { signal: deps.signal } : {})
  };

  const extracted = extractHostsFromContents(contents, {
    skipFileSuffix: provider.skipFileSuffix,
    ...(deps.parseHost ? { parseHost: deps.parseHost } : {})
  });
  const warnings = [...extracted.warnings];

  let hostToIPs: Map<string, string[]>;
  try {
    const resolved = await parallelResolve(extracted.hosts, { ...settings, failOnErr: true });
    hostToIPs = resolved.hostToIPs;
    warnings.push(...resolved.warnings);
  } catch (error) {
    if (error instanceof ResolutionExhaustedError) {
      throw new ServerUpdateError(`cannot resolve hosts from archive: ${error.message}`, [...warnings, ...error.warnings], {
        cause: error
      });
    }
    throw error;
  }

  const remaining = new Map(table);
  const servers: Server[] = [];

  for (const host of sortedKeys(hostToIPs)) {
    const ips = hostToIPs.get(host) ?? [];
    if (ips.length === 0) {
      continue;
    }

    const subdomain = stripSuffix(host, provider.domainSuffix);
    let region = remaining.get(subdomain);
    if (region !== undefined) {
      remaining.delete(subdomain);
    } else {
      region = subdomain;
      warnings.push(`subdomain ${JSON.stringify(subdomain)} not found in region table`);
    }

    servers.push({ region, ips: uniqueSortedIPs(ips) });
  }

  const fallback = await findRemainingServers(remaining, provider.domainSuffix, settings);
  warnings.push(...fallback.warnings);
  servers.push(...fallback.servers);

  return {
    servers: sortServers(mergeRegions(servers, warnings)),
    warnings
  };
}

/** Best-effort pass over table entries the archive did not cover. */
export async function findRemainingServers(
  remaining: ReadonlyMap<string, string>,
  domainSuffix: string,
  settings: ResolveSettings
): Promise<FindServersResult> {
  const hostToSubdomain = new Map<string, string>();
  for (const subdomain of Array.from(remaining.keys()).sort()) {
    hostToSubdomain.set(`${subdomain}${domainSuffix}`, subdomain);
  }

  const { hostToIPs, warnings } = await parallelResolve(Array.from(hostToSubdomain.keys()), {
    ...settings,
    failOnErr: false
  });

  const servers: Server[] = [];
  for (const [host, subdomain] of hostToSubdomain) {
    const ips = hostToIPs.get(host) ?? [];
    const region = remaining.get(subdomain);
    if (ips.length === 0 || region === undefined) {
      continue;
    }
    servers.push({ region, ips: uniqueSortedIPs(ips) });
  }

  return { servers, warnings };
}

export function sortServers(servers: Server[]): Server[] {
  return [...servers].sort((left, right) => {
    if (left.region < right.region) {
      return -1;
    }
    return left.region > right.region ? 1 : 0;
  });
}

/** Folds servers sharing a region into one, so two table codes naming the same region cannot both survive. */
function mergeRegions(servers: Server[], warnings: string[]): Server[] {
  const byRegion = new Map<string, Server>();

  for (const server of servers) {
    const existing = byRegion.get(server.region);
    if (!existing) {
      byRegion.set(server.region, server);
      continue;
    }

    warnings.push(`region ${JSON.stringify(server.region)} found for several hosts, merging their addresses`);
    byRegion.set(server.region, {
      region: server.region,
      ips: uniqueSortedIPs([...existing.ips, ...server.ips])
    });
  }

  return Array.from(byRegion.values());
}

function stripSuffix(host: string, suffix: string): string {
  return suffix.length > 0 && host.endsWith(suffix) ? host.slice(0, -suffix.length) : host;
}

function sortedKeys(map: Map<string, unknown>): string[] {
  return Array.from(map.keys()).sort();
}
