#!/usr/bin/env node

import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import { serve } from "@hono/node-server";
import {
  createDnsLookup,
  getProvider,
  loadProviderRegionTable,
  loadRegionTable,
  MemoryServerStore,
  RegionTableError,
  stringifyServers,
  UnknownProviderError,
  updateServers,
  type LookupFunc,
  type ProviderConfig,
  type UpdateServersDeps
} from "@serverlist/core";
import { createServerApp, MAX_TIMER_DELAY_MS, singleFlight, startRefreshLoop } from "@serverlist/server";

import { CliUsageError, getBooleanFlag, getIntegerFlag, getStringFlag, parseCliArgs, type CliFlags } from "./args.js";
import { loadConfigsFromDirectory } from "./fs-loader.js";

const DEFAULT_PROVIDER = "surfshark";
const DEFAULT_PORT = 8787;
const DEFAULT_REFRESH_MINUTES = 60;
const MINUTE_MS = 60_000;
const MAX_PORT = 65_535;

export interface CliDeps {
  lookup?: LookupFunc;
  fetchImpl?: typeof fetch;
  now?: () => number;
}

export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const parsed = parseCliArgs(argv);

  try {
    switch (parsed.command) {
      case "update":
        return await runUpdate(parsed.flags, deps);
      case "serve":
        return await runServe(parsed.flags, deps);
      case "help":
      default:
        printHelp();
        return parsed.command === "help" ? 0 : 1;
    }
  } catch (error) {
    if (error instanceof CliUsageError || error instanceof UnknownProviderError || error instanceof RegionTableError) {
      console.error(error.message);
      return 1;
    }
    throw error;
  }
}

async function runUpdate(flags: CliFlags, deps: CliDeps): Promise<number> {
  const provider = getProvider(getStringFlag(flags, "provider") ?? DEFAULT_PROVIDER);
  const outFile = getStringFlag(flags, "out");
  const toStdout = getBooleanFlag(flags, "stdout");
  const quiet = getBooleanFlag(flags, "quiet");
  const timeout = getIntegerFlag(flags, "timeout", 1, MAX_TIMER_DELAY_MS);

  const store = new MemoryServerStore();
  const updateDeps = await buildUpdateDeps(provider, flags, deps);
  if (timeout !== undefined) {
    updateDeps.signal = AbortSignal.timeout(timeout);
  }
  if (!quiet) {
    updateDeps.onWarning = (warning) => console.warn(`${provider.name}: ${warning}`);
  }

  try {
    await updateServers(store, updateDeps);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(message);
    return 1;
  }

  const list = store.get();
  if (outFile) {
    const outPath = path.resolve(process.cwd(), outFile);
    await mkdir(path.dirname(outPath), { recursive: true });
    await writeFile(outPath, `${JSON.stringify(list, null, 2)}\n`, "utf8");
  }

  if (toStdout) {
    console.log(stringifyServers(list.servers, `${provider.name}Servers`));
  }

  console.error(`updated provider=${provider.name} servers=${list.servers.length} timestamp=${list.timestamp}`);
  return 0;
}

async function runServe(flags: CliFlags, deps: CliDeps): Promise<number> {
  const provider = getProvider(getStringFlag(flags, "provider") ?? DEFAULT_PROVIDER);
  const port = getIntegerFlag(flags, "port", 1, MAX_PORT) ?? DEFAULT_PORT;
  const refreshMinutes = getIntegerFlag(flags, "refresh", 1, Math.floor(MAX_TIMER_DELAY_MS / MINUTE_MS)) ?? DEFAULT_REFRESH_MINUTES;

  const store = new MemoryServerStore();
  const updateDeps = await buildUpdateDeps(provider, flags, deps);
  updateDeps.onWarning = (warning) => console.warn(`${provider.name}: ${warning}`);
  // Startup, interval and POST /refresh all go through this one wrapper.
  const refresh = singleFlight(() => updateServers(store, updateDeps));

  const app = createServerApp({ store, provider: provider.name, refresh });
  serve({ fetch: app.fetch, port }, (info) => {
    console.log(`serving ${provider.name} servers on port ${info.port}`);
  });

  const reportError = (error: unknown): void => {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`refresh failed: ${message}`);
  };
  startRefreshLoop(refresh, refreshMinutes * MINUTE_MS, reportError);
  refresh().catch(reportError);
  return 0;
}

async function buildUpdateDeps(provider: ProviderConfig, flags: CliFlags, deps: CliDeps): Promise<UpdateServersDeps> {
  const regionsFile = getStringFlag(flags, "regions");
  const configDir = getStringFlag(flags, "config-dir");
  const archiveUrl = getStringFlag(flags, "url");
  const repetition = getIntegerFlag(flags, "repetition", 1);
  const timeBetween = getIntegerFlag(flags, "time-between", 0, MAX_TIMER_DELAY_MS);

  const table = regionsFile
    ? await loadRegionTable(path.resolve(process.cwd(), regionsFile))
    : await loadProviderRegionTable(provider);

  return {
    provider,
    table,
    lookup: deps.lookup ?? createDnsLookup(),
    ...(repetition !== undefined ? { repetition } : {}),
    ...(timeBetween !== undefined ? { timeBetween } : {}),
    ...(archiveUrl ? { archiveUrl } : {}),
    ...(deps.fetchImpl ? { fetchImpl: deps.fetchImpl } : {}),
    ...(deps.now ? { now: deps.now } : {}),
    ...(configDir
      ? { loadContents: () => loadConfigsFromDirectory(path.resolve(process.cwd(), configDir), provider) }
      : {})
  };
}

function printHelp(): void {
  console.log(`serverlist commands:
  update [--provider <name>] [--url <zip url>] [--config-dir <dir>] [--regions <file>]
         [--repetition <n>] [--time-between <ms>] [--timeout <ms>]
         [--out <file>] [--stdout] [--quiet]
  serve  [--provider <name>] [--port <n>] [--refresh <minutes>] [--regions <file>]

providers:
  ${DEFAULT_PROVIDER}`);
}

if (import.meta.url === `file://${process.argv[1]}`) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      const message = error instanceof Error ? error.stack ?? error.message : String(error);
      console.error(message);
      process.exitCode = 1;
    });
}
