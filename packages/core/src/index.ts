export { extractFilesFromZip, fetchArchive } from "./archive.js";
export {
  ArchiveFetchError,
  OvpnParseError,
  RegionTableError,
  ResolutionCancelledError,
  ResolutionExhaustedError,
  ServerUpdateError,
  UnknownProviderError
} from "./errors.js";
export { extractHostsFromContents } from "./extractor.js";
export { stringifyServers } from "./format.js";
export { isIPAddress, uniqueSortedIPs } from "./ip.js";
export { createDnsLookup, type DnsLookupOptions } from "./lookup.js";
export { extractHostFromOvpn, extractRemoteHosts } from "./ovpn.js";
export { getProvider, loadProviderRegionTable, PROVIDERS } from "./providers.js";
export {
  DEFAULT_REPETITION,
  DEFAULT_TIME_BETWEEN,
  findRemainingServers,
  findServersFromArchive,
  findServersFromContents,
  sortServers,
  type ResolveSettings
} from "./reconciler.js";
export { loadRegionTable, regionTableFromRecord } from "./regions.js";
export { parallelResolve, resolveRepeat } from "./resolver.js";
export { MemoryServerStore } from "./store.js";
export { updateServers } from "./updater.js";
export type * from "./types.js";
