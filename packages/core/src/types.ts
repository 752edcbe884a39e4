export interface Server {
  region: string;
  ips: string[];
}

export interface ServerList {
  timestamp: number;
  servers: Server[];
}

export type RegionTable = ReadonlyMap<string, string>;

export type LookupFunc = (hostname: string, signal: AbortSignal) => Promise<string[]>;

export interface ParsedHost {
  host: string;
  warning?: string;
}

export type ParseHostFunc = (content: string) => ParsedHost;

export interface ParallelResolveOptions {
  lookup: LookupFunc;
  repetition: number;
  timeBetween: number;
  failOnErr: boolean;
  signal?: AbortSignal;
}

export interface ParallelResolveResult {
  hostToIPs: Map<string, string[]>;
  warnings: string[];
}

export interface ExtractHostsOptions {
  skipFileSuffix?: string;
  parseHost?: ParseHostFunc;
}

export interface ExtractHostsResult {
  hosts: string[];
  warnings: string[];
}

export interface ProviderConfig {
  name: string;
  archiveUrl: string;
  domainSuffix: string;
  skipFileSuffix: string;
  regionsFile: string;
}

export interface FetchArchiveDeps {
  fetchImpl?: typeof fetch;
  userAgent?: string;
  signal?: AbortSignal;
  fileSuffix?: string;
}

export interface FindServersDeps {
  provider: Pick<ProviderConfig, "domainSuffix" | "skipFileSuffix">;
  table: RegionTable;
  lookup: LookupFunc;
  repetition?: number;
  timeBetween?: number;
  signal?: AbortSignal;
  parseHost?: ParseHostFunc;
}

export interface FindServersResult {
  servers: Server[];
  warnings: string[];
}

export interface UpdateServersDeps extends Omit<FindServersDeps, "provider"> {
  provider: ProviderConfig;
  archiveUrl?: string;
  fetchImpl?: typeof fetch;
  userAgent?: string;
  now?: () => number;
  loadContents?: () => Promise<Record<string, string>>;
  onWarning?: (warning: string) => void;
}

export interface UpdateServersResult {
  timestamp: number;
  servers: Server[];
  warnings: string[];
}
