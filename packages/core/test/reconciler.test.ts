import { strToU8, zipSync } from "fflate";
import { describe, expect, test } from "vitest";

import { ResolutionCancelledError, ServerUpdateError } from "../src/errors.js";
import { findServersFromArchive, findServersFromContents, sortServers } from "../src/reconciler.js";
import { regionTableFromRecord } from "../src/regions.js";
import { DEMO_PROVIDER, fakeLookup } from "./helpers.js";

const table = regionTableFromRecord({
  "aa-one": "Alpha One",
  "bb-two": "Beta Two",
  "cc-three": "Gamma Three"
});

const archiveOnlyA = {
  "aa-one_udp.ovpn": "remote aa-one.vpn.test 1194\n",
  "aa-one_tcp.ovpn": "remote aa-one.vpn.test 443\n"
};

const settings = { repetition: 2, timeBetween: 0 };

describe("findServersFromContents", () => {
  test("completes the archive with table entries it did not mention", async () => {
    const { lookup, calls } = fakeLookup({
      "aa-one.vpn.test": [["10.0.0.2", "10.0.0.1", "10.0.0.2"]],
      "bb-two.vpn.test": [["10.0.1.1"]],
      "cc-three.vpn.test": [["10.0.2.1"]]
    });

    const result = await findServersFromContents(archiveOnlyA, {
      provider: DEMO_PROVIDER,
      table,
      lookup,
      ...settings
    });

    expect(result.servers).toEqual([
      { region: "Alpha One", ips: ["10.0.0.1", "10.0.0.2"] },
      { region: "Beta Two", ips: ["10.0.1.1"] },
      { region: "Gamma Three", ips: ["10.0.2.1"] }
    ]);
    expect(result.warnings).toEqual([]);
    expect(calls.filter((host) => host === "aa-one.vpn.test")).toHaveLength(1);
    expect(Array.from(table.entries())).toEqual([
      ["aa-one", "Alpha One"],
      ["bb-two", "Beta Two"],
      ["cc-three", "Gamma Three"]
    ]);
  });

  test("names unknown subdomains after their code and warns", async () => {
    const { lookup } = fakeLookup({
      "aa-one.vpn.test": [["10.0.0.1"]],
      "zz-new.vpn.test": [["10.9.9.9"]],
      "bb-two.vpn.test": [["10.0.1.1"]],
      "cc-three.vpn.test": [["10.0.2.1"]]
    });

    const result = await findServersFromContents(
      { ...archiveOnlyA, "zz-new_udp.ovpn": "remote zz-new.vpn.test 1194\n" },
      { provider: DEMO_PROVIDER, table, lookup, ...settings }
    );

    expect(result.servers.map((server) => server.region)).toEqual(["Alpha One", "Beta Two", "Gamma Three", "zz-new"]);
    expect(result.servers[3]).toEqual({ region: "zz-new", ips: ["10.9.9.9"] });
    expect(result.warnings).toEqual(['subdomain "zz-new" not found in region table']);
  });

  test("drops table entries that no longer resolve", async () => {
    const { lookup } = fakeLookup({
      "aa-one.vpn.test": [["10.0.0.1"]],
      "bb-two.vpn.test": [["10.0.1.1"]]
    });

    const result = await findServersFromContents(archiveOnlyA, { provider: DEMO_PROVIDER, table, lookup, ...settings });

    expect(result.servers).toEqual([
      { region: "Alpha One", ips: ["10.0.0.1"] },
      { region: "Beta Two", ips: ["10.0.1.1"] }
    ]);
    expect(result.warnings).toEqual(['no IP address found for host "cc-three.vpn.test"']);
  });

  test("fails the run when an archive host never resolves", async () => {
    const { lookup, calls } = fakeLookup({});

    const pending = findServersFromContents(
      { ...archiveOnlyA, "broken_udp.ovpn": "client\n" },
      { provider: DEMO_PROVIDER, table, lookup, ...settings }
    );

    await expect(pending).rejects.toBeInstanceOf(ServerUpdateError);
    await expect(pending).rejects.toMatchObject({
      message: 'cannot resolve hosts from archive: no IP address found for host "aa-one.vpn.test" after 2 attempts',
      warnings: ["remote host not found in broken_udp.ovpn", 'no IP address found for host "aa-one.vpn.test"']
    });
    expect(calls).toEqual(["aa-one.vpn.test", "aa-one.vpn.test"]);
  });

  test("keeps one server per region when two codes share a name", async () => {
    const sharedTable = regionTableFromRecord({ "aa-one": "Alpha", "aa-two": "Alpha" });
    const { lookup } = fakeLookup({
      "aa-one.vpn.test": [["10.0.0.2"]],
      "aa-two.vpn.test": [["10.0.0.1", "10.0.0.2"]]
    });

    const result = await findServersFromContents(
      {
        "aa-one_udp.ovpn": "remote aa-one.vpn.test 1194\n",
        "aa-two_udp.ovpn": "remote aa-two.vpn.test 1194\n"
      },
      { provider: DEMO_PROVIDER, table: sharedTable, lookup, ...settings }
    );

    expect(result.servers).toEqual([{ region: "Alpha", ips: ["10.0.0.1", "10.0.0.2"] }]);
    expect(result.warnings).toEqual(['region "Alpha" found for several hosts, merging their addresses']);
  });

  test("resolves the whole table when the archive yields no host", async () => {
    const { lookup } = fakeLookup({
      "aa-one.vpn.test": [["10.0.0.1"]],
      "bb-two.vpn.test": [["10.0.1.1"]],
      "cc-three.vpn.test": [["10.0.2.1"]]
    });

    const result = await findServersFromContents({}, { provider: DEMO_PROVIDER, table, lookup, ...settings });

    expect(result.servers.map((server) => server.region)).toEqual(["Alpha One", "Beta Two", "Gamma Three"]);
  });

  test("propagates cancellation instead of a partial list", async () => {
    const { lookup } = fakeLookup({ "aa-one.vpn.test": [["10.0.0.1"]] });

    const pending = findServersFromContents(archiveOnlyA, {
      provider: DEMO_PROVIDER,
      table,
      lookup,
      ...settings,
      signal: AbortSignal.abort()
    });

    await expect(pending).rejects.toBeInstanceOf(ResolutionCancelledError);
  });
});

describe("findServersFromArchive", () => {
  test("fetches, extracts and reconciles", async () => {
    const zipBytes = zipSync({
      "configs/bb-two_udp.ovpn": strToU8("remote bb-two.vpn.test 1194\n"),
      "configs/bb-two_tcp.ovpn": strToU8("remote bb-two.vpn.test 443\n")
    });
    const fetchImpl: typeof fetch = async () => new Response(zipBytes, { status: 200 });
    const { lookup } = fakeLookup({ "bb-two.vpn.test": [["10.0.1.1"]] });

    const result = await findServersFromArchive("https://example.com/configs.zip", {
      provider: DEMO_PROVIDER,
      table,
      lookup,
      fetchImpl,
      ...settings
    });

    expect(result.servers).toEqual([{ region: "Beta Two", ips: ["10.0.1.1"] }]);
    expect(result.warnings).toEqual([
      'no IP address found for host "aa-one.vpn.test"',
      'no IP address found for host "cc-three.vpn.test"'
    ]);
  });
});

describe("sortServers", () => {
  test("orders by region with plain code unit comparison", () => {
    const sorted = sortServers([
      { region: "b", ips: [] },
      { region: "B", ips: [] },
      { region: "A", ips: [] }
    ]);

    expect(sorted.map((server) => server.region)).toEqual(["A", "B", "b"]);
  });
});
