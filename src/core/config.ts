/**
 * Ticket table: which providers exist and which channels trigger them
 *
 * The table is JSON (config/tickets.json by default) validated with zod.
 * `buildRegistry` turns it into live providers.
 */

import { readFileSync } from 'fs';
import path from 'path';
import { Octokit } from '@octokit/rest';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors';
import type { PageFetcher } from './fetcher';
import { reGroupFixup, templateFixup } from './fixup';
import { compilePattern } from './patterns';
import { TicketRegistry } from './registry';
import { GitHubIssueProvider, type IssuesApi } from './providers/github';
import { GitLabIssueProvider } from './providers/gitlab';
import { HtmlTitleProvider } from './providers/html-title';
import { ProposalIndexProvider } from './providers/proposal-index';
import { RequestTrackerProvider, type CommandRunner } from './providers/request-tracker';
import { STATUS_FINDERS } from './providers/status';
import type { Fixup, ProviderOptions, RepeatGuard, TicketProvider } from './types';

export const DEFAULT_TICKET_TABLE = path.resolve(__dirname, '../../config/tickets.json');

const PatternSchema = z.object({
  source: z.string().min(1),
  flags: z.string().regex(/^[imsu]*$/, 'flags may only contain i, m, s, u').optional(),
});

const FixupSchema = z.union([
  z.object({ regex: z.string().min(1) }).strict(),
  z.object({ template: z.string().min(1) }).strict(),
]);

const providerBase = {
  name: z.string().min(1),
  prefix: z.string().min(1).optional(),
  postfix: z.string().optional(),
  pattern: PatternSchema.optional(),
  fixup: FixupSchema.optional(),
  minRepeatSeconds: z.number().nonnegative().optional(),
};

const ProviderSpecSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('html-title'),
    ...providerBase,
    url: z.string().url(),
    status: z.enum(['trac']).optional(),
  }),
  z.object({
    kind: z.literal('github'),
    ...providerBase,
    repo: z.string().regex(/^[^/\s]+\/[^/\s]+$/, 'expected owner/name'),
  }),
  z.object({
    kind: z.literal('gitlab'),
    ...providerBase,
    url: z.string().url(),
  }),
  z.object({
    kind: z.literal('proposal-index'),
    ...providerBase,
    indexUrl: z.string().url().optional(),
    refreshSeconds: z.number().positive().optional(),
  }),
  z.object({
    kind: z.literal('request-tracker'),
    ...providerBase,
    rtrc: z.string().min(1),
  }),
]);

const BindingSpecSchema = z.object({
  provider: z.string().min(1),
  channels: z.array(z.string().min(1)).min(1),
  pattern: PatternSchema.optional(),
  default: z.boolean().optional(),
});

export const TicketTableSchema = z.object({
  repeatWindowSeconds: z.number().nonnegative().optional(),
  debugChannels: z.array(z.string().min(1)).optional(),
  providers: z.array(ProviderSpecSchema).min(1),
  bindings: z.array(BindingSpecSchema).default([]),
});

export type TicketTable = z.infer<typeof TicketTableSchema>;
export type ProviderSpec = z.infer<typeof ProviderSpecSchema>;
export type BindingSpec = z.infer<typeof BindingSpecSchema>;
type PatternSpec = z.infer<typeof PatternSchema>;
type FixupSpec = z.infer<typeof FixupSchema>;

/** Collaborators the providers use; tests swap them for in-process fakes */
export interface RegistryDeps {
  guard?: RepeatGuard;
  fetcher?: PageFetcher;
  githubIssues?: IssuesApi;
  githubToken?: string;
  gitlabToken?: string;
  runner?: CommandRunner;
}

export function parseTicketTable(raw: unknown, source = 'ticket table'): TicketTable {
  const parsed = TicketTableSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`Invalid ${source}`, issues);
  }
  return parsed.data;
}

export function loadTicketTable(filePath = DEFAULT_TICKET_TABLE): TicketTable {
  let text: string;
  try {
    text = readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read ticket table ${filePath}: ${errorMessage(err)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Ticket table ${filePath} is not valid JSON: ${errorMessage(err)}`);
  }
  return parseTicketTable(raw, `ticket table ${filePath}`);
}

function compileSpec(spec: PatternSpec, where: string): RegExp {
  try {
    return compilePattern(spec.source, spec.flags);
  } catch (err) {
    throw new ConfigError(`Invalid pattern for ${where}: ${errorMessage(err)}`);
  }
}

function buildFixup(spec: FixupSpec, where: string): Fixup {
  if ('template' in spec) return templateFixup(spec.template);
  try {
    return reGroupFixup(spec.regex);
  } catch (err) {
    throw new ConfigError(`Invalid fixup regex for ${where}: ${errorMessage(err)}`);
  }
}

function createProvider(spec: ProviderSpec, table: TicketTable, deps: RegistryDeps, issues: () => IssuesApi): TicketProvider {
  const where = `provider "${spec.name}"`;
  const base: ProviderOptions = {
    name: spec.name,
    prefix: spec.prefix,
    postfix: spec.postfix,
    pattern: spec.pattern ? compileSpec(spec.pattern, where) : undefined,
    fixup: spec.fixup ? buildFixup(spec.fixup, where) : undefined,
    minRepeatSeconds: spec.minRepeatSeconds ?? table.repeatWindowSeconds,
    debugChannels: table.debugChannels,
  };

  switch (spec.kind) {
    case 'html-title':
      return new HtmlTitleProvider({
        ...base,
        url: spec.url,
        statusFinder: spec.status ? STATUS_FINDERS[spec.status] : undefined,
        fetcher: deps.fetcher,
      });
    case 'github':
      return new GitHubIssueProvider({ ...base, repo: spec.repo, issues: issues() });
    case 'gitlab':
      return new GitLabIssueProvider({ ...base, url: spec.url, token: deps.gitlabToken, fetcher: deps.fetcher });
    case 'proposal-index':
      return new ProposalIndexProvider({
        ...base,
        indexUrl: spec.indexUrl,
        refreshSeconds: spec.refreshSeconds,
        fetcher: deps.fetcher,
      });
    case 'request-tracker':
      return new RequestTrackerProvider({ ...base, rtrc: spec.rtrc, runner: deps.runner });
  }
}

/** Construct every provider, then apply the bindings in file order */
export function buildRegistry(table: TicketTable, deps: RegistryDeps = {}): TicketRegistry {
  const registry = new TicketRegistry(deps.guard);

  let sharedIssues = deps.githubIssues;
  const issues = (): IssuesApi => {
    if (!sharedIssues) sharedIssues = new Octokit({ auth: deps.githubToken }).rest.issues;
    return sharedIssues;
  };

  for (const spec of table.providers) {
    registry.register(createProvider(spec, table, deps, issues));
  }

  table.bindings.forEach((binding, index) => {
    const where = `binding #${index + 1} (${binding.provider})`;
    const pattern = binding.pattern ? compileSpec(binding.pattern, where) : undefined;
    for (const channel of binding.channels) {
      registry.bind(binding.provider, channel, { pattern, default: binding.default });
    }
  });

  return registry;
}
