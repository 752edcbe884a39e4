export type CliFlags = Record<string, string | boolean>;

export interface CliArgs {
  command: string;
  flags: CliFlags;
  positionals: string[];
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export function parseCliArgs(argv: string[]): CliArgs {
  const [first = "help", ...rest] = argv;
  const command = first === "-h" || first === "--help" ? "help" : first;
  const flags: CliFlags = {};
  const positionals: string[] = [];

  for (let i = 0; i < rest.length; i += 1) {
    const token = rest[i];
    if (!token) {
      continue;
    }

    if (token === "--") {
      positionals.push(...rest.slice(i + 1));
      break;
    }

    if (token.startsWith("--")) {
      const trimmed = token.slice(2);
      const eq = trimmed.indexOf("=");

      if (eq !== -1) {
        flags[trimmed.slice(0, eq)] = trimmed.slice(eq + 1);
        continue;
      }

      const next = rest[i + 1];
      if (next !== undefined && !next.startsWith("--")) {
        flags[trimmed] = next;
        i += 1;
      } else {
        flags[trimmed] = true;
      }
      continue;
    }

    positionals.push(token);
  }

  return { command, flags, positionals };
}

export function getStringFlag(flags: CliFlags, key: string): string | undefined {
  const value = flags[key];
  return typeof value === "string" ? value : undefined;
}

export function getBooleanFlag(flags: CliFlags, key: string): boolean {
  const value = flags[key];
  return value === true || value === "true";
}

/** Integer flag within `min`..`max`; absent flags yield undefined. */
export function getIntegerFlag(
  flags: CliFlags,
  key: string,
  min: number,
  max = Number.MAX_SAFE_INTEGER
): number | undefined {
  const value = flags[key];
  if (value === undefined) {
    return undefined;
  }

  if (typeof value !== "string" || !/^\d+$/.test(value)) {
    throw new CliUsageError(`--${key} expects an integer >= ${min}`);
  }

  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed) || parsed < min) {
    throw new CliUsageError(`--${key} expects an integer >= ${min}, got ${value}`);
  }
  if (parsed > max) {
    throw new CliUsageError(`--${key} expects an integer <= ${max}, got ${value}`);
  }
  return parsed;
}
