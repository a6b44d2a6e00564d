// This module tracks the handshake state of one server instance.

import type { ClientInfo } from '../types/mcp.js';

// Read-only view handed to every handler except the handshake.
export interface SessionView {
  isReady(): boolean;
  getClientInfo(): ClientInfo | null;
}

// Handlers run to completion on the event loop, so the flag is never observed mid-write.
export class SessionState implements SessionView {
  private ready = false;
  private clientInfo: ClientInfo | null = null;

  public isReady(): boolean {
    return this.ready;
  }

  public getClientInfo(): ClientInfo | null {
    return this.clientInfo;
  }

  // Repeated handshakes re-confirm readiness; the first client identity is kept.
  public markReady(client: ClientInfo): void {
    if (this.ready) {
      return;
    }

    this.ready = true;
    this.clientInfo = { name: client.name, version: client.version };
  }
}
