import { extractHostFromOvpn } from "./ovpn.js";
import type { ExtractHostsOptions, ExtractHostsResult } from "./types.js";

/**
 * Turns archive members into candidate hostnames. Members ending with
 * `skipFileSuffix` are protocol variants of another member and are ignored
 * silently; a member the parser rejects becomes a warning.
 */
export function extractHostsFromContents(
  contents: Record<string, string>,
  options: ExtractHostsOptions = {}
): ExtractHostsResult {
  const parseHost = options.parseHost ?? extractHostFromOvpn;
  const skipSuffix = options.skipFileSuffix;
  const hosts = new Set<string>();
  const warnings: string[] = [];

  for (const fileName of Object.keys(contents).sort()) {
    if (skipSuffix && fileName.endsWith(skipSuffix)) {
      continue;
    }

    try {
      const parsed = parseHost(contents[fileName] ?? "");
      if (parsed.warning) {
        warnings.push(parsed.warning);
      }
      hosts.add(parsed.host.toLowerCase());
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      warnings.push(`${message} in ${fileName}`);
    }
  }

  return {
    hosts: Array.from(hosts).sort(),
    warnings
  };
}
