import { fileURLToPath } from "node:url";

import { UnknownProviderError } from "./errors.js";
import { loadRegionTable } from "./regions.js";
import type { ProviderConfig, RegionTable } from "./types.js";

export const PROVIDERS: Readonly<Record<string, ProviderConfig>> = {
  surfshark: {
    name: "surfshark",
    archiveUrl: "https://my.surfshark.com/vpn/api/v1/server/configurations",
    domainSuffix: ".prod.surfshark.com",
    skipFileSuffix: "_tcp.ovpn",
    regionsFile: fileURLToPath(new URL("../data/surfshark-regions.json", import.meta.url))
  }
};

export function getProvider(name: string): ProviderConfig {
  const provider = PROVIDERS[name.trim().toLowerCase()];
  if (!provider) {
    throw new UnknownProviderError(name);
  }
  return provider;
}

export function loadProviderRegionTable(provider: ProviderConfig): Promise<RegionTable> {
  return loadRegionTable(provider.regionsFile);
}
