import { isIP } from "node:net";

import ipaddr from "ipaddr.js";

interface ParsedAddress {
  text: string;
  bytes: number[];
}

export function isIPAddress(input: string): boolean {
  return isIP(input) !== 0;
}

/**
 * Deduplicates addresses and sorts them ascending by their 16-byte form, so
 * IPv4 addresses (compared as IPv4-mapped IPv6) come before global IPv6 ones.
 * IPv4-mapped IPv6 inputs collapse onto their IPv4 form. Unparseable entries
 * are dropped.
 */
export function uniqueSortedIPs(ips: Iterable<string>): string[] {
  const unique = new Map<string, ParsedAddress>();

  for (const raw of ips) {
    const parsed = parseAddress(raw);
    if (parsed && !unique.has(parsed.text)) {
      unique.set(parsed.text, parsed);
    }
  }

  return Array.from(unique.values())
    .sort((left, right) => compareBytes(left.bytes, right.bytes))
    .map((item) => item.text);
}

function parseAddress(raw: string): ParsedAddress | null {
  const trimmed = raw.trim();
  if (!isIPAddress(trimmed)) {
    return null;
  }

  let address = ipaddr.parse(trimmed);
  if (address instanceof ipaddr.IPv6 && address.isIPv4MappedAddress()) {
    address = address.toIPv4Address();
  }

  const bytes = address instanceof ipaddr.IPv4 ? address.toIPv4MappedAddress().toByteArray() : address.toByteArray();
  return { text: address.toString(), bytes };
}

function compareBytes(left: number[], right: number[]): number {
  const length = Math.min(left.length, right.length);
  for (let index = 0; index < length; index += 1) {
    const diff = (left[index] ?? 0) - (right[index] ?? 0);
    if (diff !== 0) {
      return diff;
    }
  }
  return left.length - right.length;
}
