/**
 * GitHubIssueProvider — issue and pull request titles through the REST API
 */

import { Octokit } from '@octokit/rest';
import { BaseProvider } from '../provider';
import { ConfigError, TicketNotFoundError } from '../errors';
import type { FetchedTicket, ProviderOptions } from '../types';

/** The slice of `octokit.rest.issues` we use */
export interface IssuesApi {
  get(params: { owner: string; repo: string; issue_number: number }): Promise<{
    data: {
      title: string;
      state: string;
      pull_request?: { merged_at?: string | null } | null;
    };
  }>;
}

export interface GitHubIssueProviderOptions extends ProviderOptions {
  /** owner/name */
  repo: string;
  issues?: IssuesApi;
  token?: string;
}

export function httpStatusOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

export class GitHubIssueProvider extends BaseProvider {
  readonly owner: string;
  readonly repo: string;
  private readonly issues: IssuesApi;

  constructor(opts: GitHubIssueProviderOptions) {
    super(opts);
    const [owner, repo] = opts.repo.split('/');
    if (!owner || !repo) {
      throw new ConfigError(`[${opts.name}] invalid GitHub repo "${opts.repo}", expected owner/name`);
    }
    this.owner = owner;
    this.repo = repo;
    this.issues = opts.issues ?? new Octokit({ auth: opts.token }).rest.issues;
  }

  protected async fetchTicket(id: string): Promise<FetchedTicket> {
    const issueNumber = parseInt(id, 10);
    if (isNaN(issueNumber)) {
      throw new TicketNotFoundError(this.name, id, 'not a number');
    }

    try {
      const { data } = await this.issues.get({ owner: this.owner, repo: this.repo, issue_number: issueNumber });
      let status: string | undefined;
      if (data.pull_request?.merged_at) status = 'merged';
      else if (data.state !== 'open') status = data.state;
      return { title: data.title, status };
    } catch (err) {
      const status = httpStatusOf(err);
      if (status === 404 || status === 410) {
        throw new TicketNotFoundError(this.name, id, `HTTP ${status}`, err);
      }
      throw err;
    }
  }
}
