/**
 * BaseProvider — shared detection, formatting and repeat suppression
 *
 * Subclasses only implement `fetchTicket(id)`. Everything else (which
 * patterns apply in which channel, how the title is decorated, when a
 * reference was already answered) lives here.
 */

import type pino from 'pino';
import { createLogger } from './logger';
import { TicketNotFoundError, errorMessage } from './errors';
import {
  DEFAULT_TICKET_PATTERN,
  compilePattern,
  findTicketRefs,
  matchesChannel,
  prefixPattern,
} from './patterns';
import type {
  BindOptions,
  ChannelBinding,
  FetchedTicket,
  Fixup,
  ProviderOptions,
  RepeatGuard,
  TicketProvider,
  TicketRef,
} from './types';

const log = createLogger('provider');

export const DEFAULT_MIN_REPEAT_SECONDS = 1800;
export const DEFAULT_DEBUG_CHANNELS = ['#*-test'];

const defaultPattern = compilePattern(DEFAULT_TICKET_PATTERN);

export abstract class BaseProvider implements TicketProvider {
  readonly name: string;
  readonly prefix?: string;
  readonly postfix?: string;
  readonly minRepeatMs: number;
  /** Channels that get step-by-step debug tracing */
  readonly debugChannels: string[];

  private readonly fixup?: Fixup;
  private readonly pattern?: RegExp;
  private readonly channels = new Map<string, ChannelBinding>();

  constructor(opts: ProviderOptions) {
    this.name = opts.name;
    this.fixup = opts.fixup;
    this.prefix = opts.prefix;
    this.postfix = opts.postfix;
    this.minRepeatMs = (opts.minRepeatSeconds ?? DEFAULT_MIN_REPEAT_SECONDS) * 1000;
    this.debugChannels = opts.debugChannels ?? DEFAULT_DEBUG_CHANNELS;

    if (opts.pattern) {
      this.pattern = opts.pattern;
    } else if (opts.prefix) {
      this.pattern = prefixPattern(opts.prefix);
    }
  }

  /** Raw title (and optional status) for a ticket; throw TicketNotFoundError when it does not exist */
  protected abstract fetchTicket(id: string, ref?: TicketRef): Promise<FetchedTicket>;

  get patternSource(): string | undefined {
    return this.pattern?.source;
  }

  bindings(): ChannelBinding[] {
    return Array.from(this.channels.values());
  }

  /** Add a dedicated trigger for this provider in a channel (glob) */
  addChannel(channel: string, opts: BindOptions = {}): void {
    if (this.channels.has(channel)) {
      log.warn({ provider: this.name, channel }, 'Re-adding channel binding');
    }
    this.channels.set(channel, {
      channel,
      pattern: opts.pattern,
      default: opts.default ?? false,
    });
  }

  /** References found by the provider's own pattern, in any channel */
  matches(text: string): TicketRef[] {
    if (!this.pattern) return [];
    return findTicketRefs(this.pattern, text);
  }

  /**
   * All references this provider answers for a message in `target`:
   * its own pattern first, then every matching binding's default and extra patterns.
   * Duplicate ids keep their first position.
   */
  refsFor(target: string, text: string): TicketRef[] {
    const trace = this.tracer(target);
    const refs: TicketRef[] = [...this.matches(text)];

    for (const binding of this.channels.values()) {
      if (!matchesChannel(binding.channel, target)) continue;

      if (binding.default) {
        trace.debug({ binding: binding.channel, text }, 'Checking default pattern');
        refs.push(...findTicketRefs(defaultPattern, text));
      }
      if (binding.pattern) {
        trace.debug({ binding: binding.channel, pattern: binding.pattern.source, text }, 'Checking channel pattern');
        refs.push(...findTicketRefs(binding.pattern, text));
      }
    }

    const seen = new Set<string>();
    const unique = refs.filter(ref => {
      if (seen.has(ref.id)) return false;
      seen.add(ref.id);
      return true;
    });
    trace.debug({ matches: unique.map(r => r.id) }, 'Matches');
    return unique;
  }

  /** The display line for one ticket */
  async lookup(id: string, ref?: TicketRef): Promise<string> {
    const fetched = await this.fetchTicket(id, ref);
    let title = fetched.title.replace(/\s+/g, ' ').trim();

    if (this.fixup) title = this.fixup(id, title);
    if (this.prefix) title = this.prefix + title;
    if (fetched.status) title = `${title} [${fetched.status}]`;
    if (this.postfix) title += this.postfix.replace(/\{id\}/g, () => id);

    return title;
  }

  async handleMessage(target: string, text: string, guard: RepeatGuard): Promise<string[]> {
    const trace = this.tracer(target);
    trace.debug({ text }, 'Handling message');

    const lines: string[] = [];
    for (const ref of this.refsFor(target, text)) {
      const key = { provider: this.name, target, ticketId: ref.id };
      const now = Date.now();

      if (guard.wasSentSince(key, now - this.minRepeatMs)) {
        log.debug({ provider: this.name, target, ticket: ref.id }, 'Rate limited match');
        continue;
      }
      // Reserve before the lookup; concurrent messages for this ticket must see it
      guard.record(key, now);

      let line: string;
      try {
        line = await this.lookup(ref.id, ref);
      } catch (err) {
        guard.forget(key);
        if (err instanceof TicketNotFoundError) {
          log.debug({ provider: this.name, target, ticket: ref.id, reason: err.message }, 'Failed to look up ticket');
        } else {
          log.warn({ provider: this.name, target, ticket: ref.id, err: errorMessage(err) }, 'Ticket lookup failed');
        }
        continue;
      }

      trace.debug({ ticket: ref.id, line }, 'Sending');
      lines.push(line);
    }
    return lines;
  }

  private tracer(target: string): pino.Logger {
    const isDebug = this.debugChannels.some(glob => matchesChannel(glob, target));
    return isDebug
      ? log.child({ provider: this.name, target }, { level: 'debug' })
      : log.child({ provider: this.name, target });
  }
}
