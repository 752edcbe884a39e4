import type { Server } from "./types.js";

/** Renders the list as a TypeScript module literal for embedding in source. */
export function stringifyServers(servers: Server[], name = "servers"): string {
  if (servers.length === 0) {
    return `export const ${name}: Server[] = [];`;
  }

  const lines = servers.map((server) => {
    const ips = server.ips.map((ip) => JSON.stringify(ip)).join(", ");
    return `  { region: ${JSON.stringify(server.region)}, ips: [${ips}] },`;
  });

  return [`export const ${name}: Server[] = [`, ...lines, "];"].join("\n");
}
