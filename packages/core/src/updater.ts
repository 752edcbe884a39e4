import { fetchArchive } from "./archive.js";
import { ServerUpdateError } from "./errors.js";
import { findServersFromContents } from "./reconciler.js";
import type { MemoryServerStore } from "./store.js";
import type { UpdateServersDeps, UpdateServersResult } from "./types.js";

/**
 * One update run: fetch the provider archive (or `loadContents`), reconcile,
 * and publish the list into the store. The store is left untouched on failure.
 */
export async function updateServers(store: MemoryServerStore, deps: UpdateServersDeps): Promise<UpdateServersResult> {
  const now = deps.now ?? (() => Date.now());
  const { provider } = deps;

  const contents = deps.loadContents
    ? await deps.loadContents()
    : await fetchArchive(deps.archiveUrl ?? provider.archiveUrl, {
        ...(deps.fetchImpl ? { fetchImpl: deps.fetchImpl } : {}),
        ...(deps.userAgent ? { userAgent: deps.userAgent } : {}),
        ...(deps.signal ? { signal: deps.signal } : {})
      });

  try {
    const { servers, warnings } = await findServersFromContents(contents, deps);
    reportWarnings(warnings, deps.onWarning);

    const timestamp = Math.floor(now() / 1000);
    store.set({ timestamp, servers });
    return { timestamp, servers, warnings };
  } catch (error) {
    if (error instanceof ServerUpdateError) {
      reportWarnings(error.warnings, deps.onWarning);
      throw new ServerUpdateError(`cannot update ${provider.name} servers: ${error.message}`, error.warnings, {
        cause: error
      });
    }
    throw error;
  }
}

function reportWarnings(warnings: string[], onWarning: ((warning: string) => void) | undefined): void {
  if (!onWarning) {
    return;
  }
  for (const warning of warnings) {
    onWarning(warning);
  }
}
