/**
 * ProposalIndexProvider — titles of numbered proposals from a plain-text index
 *
 * The index is one proposal per line (`012  Title of the proposal [STATUS]`).
 * It is downloaded once and kept for `refreshSeconds`; a failed refresh keeps
 * the previous copy.
 */

import { BaseProvider } from '../provider';
import { TicketNotFoundError, errorMessage } from '../errors';
import { fetchPage, type PageFetcher } from '../fetcher';
import { createLogger } from '../logger';
import { escapeRegExp } from '../patterns';
import type { FetchedTicket, ProviderOptions } from '../types';

const log = createLogger('proposal-index');

export const DEFAULT_PROPOSAL_INDEX_URL =
  'https://gitlab.torproject.org/tpo/core/torspec/-/raw/main/proposals/000-index.txt';
export const DEFAULT_REFRESH_SECONDS = 7200;

export interface ProposalIndexProviderOptions extends ProviderOptions {
  indexUrl?: string;
  refreshSeconds?: number;
  fetcher?: PageFetcher;
}

export class ProposalIndexProvider extends BaseProvider {
  readonly indexUrl: string;
  private readonly refreshMs: number;
  private readonly fetcher: PageFetcher;
  private data?: string;
  private expiresAt = 0;

  constructor(opts: ProposalIndexProviderOptions) {
    super(opts);
    this.indexUrl = opts.indexUrl ?? DEFAULT_PROPOSAL_INDEX_URL;
    this.refreshMs = (opts.refreshSeconds ?? DEFAULT_REFRESH_SECONDS) * 1000;
    this.fetcher = opts.fetcher ?? fetchPage;
  }

  get hasIndex(): boolean {
    return this.data !== undefined;
  }

  /** Download the index unless the cached copy is still fresh */
  async refresh(): Promise<void> {
    if (this.expiresAt > Date.now()) return;

    try {
      const page = await this.fetcher(this.indexUrl);
      this.data = page.body;
      this.expiresAt = Date.now() + this.refreshMs;
      log.debug({ provider: this.name, bytes: page.body.length }, 'Proposal index refreshed');
    } catch (err) {
      log.warn({ provider: this.name, url: this.indexUrl, err: errorMessage(err) }, 'Proposal index refresh failed');
    }
  }

  protected async fetchTicket(id: string): Promise<FetchedTicket> {
    await this.refresh();
    if (this.data === undefined) {
      throw new TicketNotFoundError(this.name, id, 'no proposal index available');
    }

    const parsed = parseInt(id, 10);
    if (isNaN(parsed)) {
      throw new TicketNotFoundError(this.name, id, 'not a number');
    }

    const number = String(parsed).padStart(3, '0');
    const line = new RegExp(`^${escapeRegExp(number)}(?!\\d)\\s*(.*)`, 'm').exec(this.data);
    if (!line) {
      throw new TicketNotFoundError(this.name, id, 'proposal not in index');
    }

    return { title: line[1] };
  }
}
