import type { Server, ServerList } from "./types.js";

export class MemoryServerStore {
  private current: ServerList = { timestamp: 0, servers: [] };

  get(): ServerList {
    return this.current;
  }

  set(list: ServerList): void {
    this.current = {
      timestamp: list.timestamp,
      servers: [...list.servers]
    };
  }

  findRegion(region: string): Server | undefined {
    return this.current.servers.find((server) => server.region === region);
  }

  isReady(): boolean {
    return this.current.timestamp > 0;
  }
}
