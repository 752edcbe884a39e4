import { readdir, readFile } from "node:fs/promises";
import path from "node:path";

import { ArchiveFetchError, type ProviderConfig } from "@serverlist/core";

const CONFIG_SUFFIX = ".ovpn";

/** Reads a provider's unpacked configuration files, the same members `fetchArchive` keeps from the zip. */
export async function loadConfigsFromDirectory(
  configDir: string,
  provider: Pick<ProviderConfig, "skipFileSuffix">
): Promise<Record<string, string>> {
  const entries = await readdir(configDir, { withFileTypes: true });
  const fileNames = entries
    .filter((entry) => entry.isFile() && entry.name.endsWith(CONFIG_SUFFIX))
    .map((entry) => entry.name)
    .filter((name) => !provider.skipFileSuffix || !name.endsWith(provider.skipFileSuffix))
    .sort();

  if (fileNames.length === 0) {
    throw new ArchiveFetchError(`no configuration files found in ${configDir}`);
  }

  const contents = await Promise.all(fileNames.map((name) => readFile(path.join(configDir, name), "utf8")));
  return Object.fromEntries(fileNames.map((name, index) => [name, contents[index] ?? ""]));
}
