/**
 * GitLabIssueProvider — `group/project#1234` references against a GitLab instance
 */

import { z } from 'zod';
import { BaseProvider } from '../provider';
import { FetchError, TicketNotFoundError } from '../errors';
import { fetchPage, type FetchOptions, type PageFetcher } from '../fetcher';
import type { FetchedTicket, ProviderOptions, TicketRef } from '../types';

const IssueSchema = z.object({
  title: z.string(),
  state: z.string(),
  web_url: z.string().optional(),
});

export interface GitLabIssueProviderOptions extends ProviderOptions {
  /** Instance base URL, e.g. https://gitlab.torproject.org/ */
  url: string;
  token?: string;
  fetcher?: PageFetcher;
}

/** `tpo/core/tor#40000` → { path: 'tpo/core/tor', number: '40000' } */
export function splitProjectRef(ref: TicketRef): { path: string; number: string } | undefined {
  if (ref.groups.path && ref.groups.number) {
    return { path: ref.groups.path, number: ref.groups.number };
  }
  const hash = ref.id.lastIndexOf('#');
  if (hash <= 0 || hash === ref.id.length - 1) return undefined;
  return { path: ref.id.slice(0, hash), number: ref.id.slice(hash + 1) };
}

export class GitLabIssueProvider extends BaseProvider {
  readonly url: string;
  private readonly token?: string;
  private readonly fetcher: PageFetcher;

  constructor(opts: GitLabIssueProviderOptions) {
    super(opts);
    this.url = opts.url.replace(/\/+$/, '');
    this.token = opts.token;
    this.fetcher = opts.fetcher ?? fetchPage;
  }

  protected async fetchTicket(id: string, ref: TicketRef = { id, groups: {} }): Promise<FetchedTicket> {
    const project = splitProjectRef(ref);
    if (!project) {
      throw new TicketNotFoundError(this.name, id, 'expected group/project#number');
    }

    const apiUrl = `${this.url}/api/v4/projects/${encodeURIComponent(project.path)}/issues/${project.number}`;
    const opts: FetchOptions = this.token ? { headers: { 'PRIVATE-TOKEN': this.token } } : {};

    let body: string;
    try {
      ({ body } = await this.fetcher(apiUrl, opts));
    } catch (err) {
      if (err instanceof FetchError && err.isClientError) {
        throw new TicketNotFoundError(this.name, id, `HTTP ${err.status}`, err);
      }
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (err) {
      throw new FetchError(`[${this.name}] invalid JSON from ${apiUrl}`, apiUrl, undefined, err);
    }
    const parsed = IssueSchema.safeParse(json);
    if (!parsed.success) {
      throw new FetchError(`[${this.name}] unexpected issue payload from ${apiUrl}`, apiUrl);
    }

    const issue = parsed.data;
    return {
      title: issue.title,
      status: issue.state === 'opened' ? undefined : issue.state,
    };
  }
}
