/**
 * HtmlTitleProvider — the title of the page at `${url}${id}`
 */

import * as cheerio from 'cheerio';
import { BaseProvider } from '../provider';
import { FetchError, TicketNotFoundError } from '../errors';
import { fetchPage, type PageFetcher } from '../fetcher';
import type { FetchedTicket, ProviderOptions } from '../types';
import type { StatusFinder } from './status';

export interface HtmlTitleProviderOptions extends ProviderOptions {
  /** Base URL; the document at `${url}${id}` carries the ticket title */
  url: string;
  statusFinder?: StatusFinder;
  fetcher?: PageFetcher;
}

export class HtmlTitleProvider extends BaseProvider {
  readonly url: string;
  private readonly statusFinder?: StatusFinder;
  private readonly fetcher: PageFetcher;

  constructor(opts: HtmlTitleProviderOptions) {
    super(opts);
    this.url = opts.url;
    this.statusFinder = opts.statusFinder;
    this.fetcher = opts.fetcher ?? fetchPage;
  }

  protected async fetchTicket(id: string): Promise<FetchedTicket> {
    const url = `${this.url}${id}`;

    let body: string;
    try {
      ({ body } = await this.fetcher(url));
    } catch (err) {
      if (err instanceof FetchError && err.isClientError) {
        throw new TicketNotFoundError(this.name, id, `HTTP ${err.status}`, err);
      }
      throw err;
    }

    const $ = cheerio.load(body);
    const title = $('title').first().text().trim();
    if (!title) {
      throw new TicketNotFoundError(this.name, id, 'page has no title');
    }

    return { title, status: this.statusFinder?.($) };
  }
}
