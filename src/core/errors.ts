/**
 * Error types shared by providers, the registry and the servers
 */

export type ErrorCode = 'INTERNAL_ERROR' | 'CONFIG_ERROR' | 'NOT_FOUND' | 'FETCH_ERROR';

export class TicketLinkError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode = 'INTERNAL_ERROR',
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'TicketLinkError';
  }
}

/** Invalid ticket table or runtime settings */
export class ConfigError extends TicketLinkError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

/** The provider has no such ticket; callers skip it quietly */
export class TicketNotFoundError extends TicketLinkError {
  constructor(
    public readonly provider: string,
    public readonly ticketId: string,
    reason?: string,
    cause?: unknown,
  ) {
    super(`[${provider}] ticket ${ticketId} not found${reason ? `: ${reason}` : ''}`, 'NOT_FOUND', cause);
    this.name = 'TicketNotFoundError';
  }
}

/** Transport-level failure talking to a remote tracker */
export class FetchError extends TicketLinkError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
    cause?: unknown,
  ) {
    super(message, 'FETCH_ERROR', cause);
    this.name = 'FetchError';
  }

  get isClientError(): boolean {
    return this.status !== undefined && this.status >= 400 && this.status < 500;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
