/**
 * TicketRegistry — the providers of one bot, in the order they answer
 */

import { ConfigError, TicketLinkError } from './errors';
import { createLogger } from './logger';
import { matchesChannel } from './patterns';
import { MemoryRepeatGuard } from './repeat-guard';
import type { BindOptions, PreviewEntry, RepeatGuard, TicketProvider } from './types';

const log = createLogger('registry');

export interface ChannelRule {
  provider: string;
  channel: string;       // The glob the rule was bound with ('*' for a provider-wide pattern)
  pattern?: string;
  default: boolean;
}

export class TicketRegistry {
  readonly guard: RepeatGuard;
  private providers = new Map<string, TicketProvider>();

  constructor(guard: RepeatGuard = new MemoryRepeatGuard()) {
    this.guard = guard;
  }

  register(provider: TicketProvider): void {
    if (this.providers.has(provider.name)) {
      throw new ConfigError(`Duplicate provider name "${provider.name}"`);
    }
    this.providers.set(provider.name, provider);
  }

  get(name: string): TicketProvider | undefined {
    return this.providers.get(name);
  }

  list(): TicketProvider[] {
    return Array.from(this.providers.values());
  }

  bind(providerName: string, channel: string, opts: BindOptions = {}): void {
    const provider = this.providers.get(providerName);
    if (!provider) {
      throw new ConfigError(`Cannot bind ${channel}: unknown provider "${providerName}"`);
    }
    provider.addChannel(channel, opts);
  }

  /** The lines to send in reply to `text` in `target`, provider by provider */
  async handleMessage(target: string, text: string): Promise<string[]> {
    const lines: string[] = [];
    for (const provider of this.providers.values()) {
      lines.push(...await provider.handleMessage(target, text, this.guard));
    }
    return lines;
  }

  /** Which references each provider would look up, without looking them up */
  preview(target: string, text: string): PreviewEntry[] {
    return this.list()
      .map(provider => ({ provider: provider.name, refs: provider.refsFor(target, text) }))
      .filter(entry => entry.refs.length > 0);
  }

  /** One-off lookup that bypasses repeat suppression */
  async lookup(providerName: string, id: string): Promise<string> {
    const provider = this.providers.get(providerName);
    if (!provider) {
      throw new TicketLinkError(`Unknown provider "${providerName}"`, 'NOT_FOUND');
    }
    return provider.lookup(id);
  }

  /** Every rule that applies in `channel`, provider-wide patterns included */
  describeChannel(channel: string): ChannelRule[] {
    const rules: ChannelRule[] = [];
    for (const provider of this.providers.values()) {
      if (provider.patternSource) {
        rules.push({ provider: provider.name, channel: '*', pattern: provider.patternSource, default: false });
      }
      for (const binding of provider.bindings()) {
        if (!matchesChannel(binding.channel, channel)) continue;
        rules.push({
          provider: provider.name,
          channel: binding.channel,
          pattern: binding.pattern?.source,
          default: binding.default,
        });
      }
    }
    return rules;
  }

  /** Refresh every provider that keeps a downloaded index */
  async refreshIndexes(): Promise<number> {
    let refreshed = 0;
    for (const provider of this.providers.values()) {
      if (!provider.refresh) continue;
      await provider.refresh();
      refreshed++;
    }
    return refreshed;
  }

  /** Forget replies older than the longest repeat window */
  pruneSent(now = Date.now()): number {
    const window = Math.max(0, ...this.list().map(p => p.minRepeatMs));
    const removed = this.guard.prune(now - window);
    if (removed > 0) log.debug({ removed }, 'Pruned sent log');
    return removed;
  }
}
