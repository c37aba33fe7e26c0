/**
 * ticketlink — answers ticket references in IRC channels with their titles
 *
 * Pipeline:
 * 1. Load the ticket table (providers + channel bindings)
 * 2. For each message, collect the references every provider answers in that channel
 * 3. Skip references already answered within the repeat window
 * 4. Fetch the title, apply the fixup, prefix, status and postfix
 * 5. Send one line per ticket
 */

export { TicketRegistry, type ChannelRule } from './core/registry';
export { BaseProvider, DEFAULT_MIN_REPEAT_SECONDS, DEFAULT_DEBUG_CHANNELS } from './core/provider';
export { HtmlTitleProvider } from './core/providers/html-title';
export { GitHubIssueProvider, type IssuesApi } from './core/providers/github';
export { GitLabIssueProvider } from './core/providers/gitlab';
export { ProposalIndexProvider } from './core/providers/proposal-index';
export { RequestTrackerProvider, type CommandRunner } from './core/providers/request-tracker';
export { tracStatus, type StatusFinder } from './core/providers/status';
export { reGroupFixup, templateFixup } from './core/fixup';
export { compilePattern, findTicketRefs, matchesChannel, DEFAULT_TICKET_PATTERN } from './core/patterns';
export { buildRegistry, loadTicketTable, parseTicketTable, DEFAULT_TICKET_TABLE } from './core/config';
export type { TicketTable, ProviderSpec, BindingSpec, RegistryDeps } from './core/config';
export { MemoryRepeatGuard } from './core/repeat-guard';
export { SentLog } from './core/db';
export { fetchPage, createFetcher, type PageFetcher, type FetchedPage, type HttpGet } from './core/fetcher';
export { TicketLinkError, ConfigError, TicketNotFoundError, FetchError } from './core/errors';
export { TicketBot } from './irc/bot';
export type { TicketRef, FetchedTicket, Fixup, TicketProvider, RepeatGuard, SentKey } from './core/types';
