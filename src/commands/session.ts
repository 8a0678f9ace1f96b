import type { SessionGrant } from "../engine";

interface SessionProps {
  clientId?: string;
}

export class Session {
  /**
   * Client metadata, e.g. remote address
   */
  readonly clientId?: string;

  /**
   * Currently selected database, null until create/use succeeds
   */
  private currentGrant: SessionGrant | null = null;

  /**
   * Consecutive failed use/drop authentications
   */
  failedAuthAttempts = 0;

  private isClosed = false;

  constructor(params: SessionProps = {}) {
    this.clientId = params.clientId;
  }

  get grant(): SessionGrant | null {
    return this.currentGrant;
  }

  get database(): string | null {
    return this.currentGrant?.name ?? null;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Used by create/use
   */
  select(grant: SessionGrant): void {
    this.currentGrant = grant;
  }

  deselect(): void {
    this.currentGrant = null;
  }

  close(): void {
    this.currentGrant = null;
    this.isClosed = true;
  }
}
