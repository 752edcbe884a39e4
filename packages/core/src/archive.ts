import { strFromU8, unzipSync } from "fflate";

import { ArchiveFetchError } from "./errors.js";
import type { FetchArchiveDeps } from "./types.js";

const DEFAULT_USER_AGENT = "serverlist-updater/1";
const DEFAULT_FILE_SUFFIX = ".ovpn";

export async function fetchArchive(url: string, deps: FetchArchiveDeps = {}): Promise<Record<string, string>> {
  const fetchImpl = deps.fetchImpl ?? fetch;
  const response = await fetchImpl(url, {
    headers: {
      "user-agent": deps.userAgent ?? DEFAULT_USER_AGENT
    },
    ...(deps.signal ? { signal: deps.signal } : {})
  });
  if (!response.ok) {
    throw new ArchiveFetchError(`failed to download archive: ${response.status} ${response.statusText}`);
  }

  const zipBytes = new Uint8Array(await response.arrayBuffer());
  return extractFilesFromZip(zipBytes, deps.fileSuffix ?? DEFAULT_FILE_SUFFIX);
}

/** Members ending with `fileSuffix`, keyed by base file name. */
export function extractFilesFromZip(zipData: Uint8Array, fileSuffix = DEFAULT_FILE_SUFFIX): Record<string, string> {
  let files: Record<string, Uint8Array>;
  try {
    files = unzipSync(zipData, {
      filter: (file) => file.name.endsWith(fileSuffix)
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ArchiveFetchError(`cannot decode archive: ${message}`);
  }

  const contents: Record<string, string> = {};
  for (const [filePath, content] of Object.entries(files)) {
    const fileName = filePath.slice(filePath.lastIndexOf("/") + 1);
    if (fileName.length === 0) {
      continue;
    }
    contents[fileName] = strFromU8(content);
  }

  if (Object.keys(contents).length === 0) {
    throw new ArchiveFetchError("no configuration files found in archive");
  }

  return contents;
}
