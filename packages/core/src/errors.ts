export class ArchiveFetchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ArchiveFetchError";
  }
}

export class OvpnParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "OvpnParseError";
  }
}

export class RegionTableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RegionTableError";
  }
}

export class UnknownProviderError extends Error {
  constructor(provider: string) {
    super(`unknown provider: ${JSON.stringify(provider)}`);
    this.name = "UnknownProviderError";
  }
}

export class ResolutionExhaustedError extends Error {
  constructor(
    readonly host: string,
    readonly attempts: number,
    readonly warnings: string[]
  ) {
    super(`no IP address found for host ${JSON.stringify(host)} after ${attempts} attempts`);
    this.name = "ResolutionExhaustedError";
  }
}

export class ResolutionCancelledError extends Error {
  constructor(message = "resolution cancelled") {
    super(message);
    this.name = "ResolutionCancelledError";
  }
}

/** Failure of a whole update run; `warnings` holds what was collected before it. */
export class ServerUpdateError extends Error {
  constructor(
    message: string,
    readonly warnings: string[],
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ServerUpdateError";
  }
}
