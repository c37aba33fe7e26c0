/**
 * Core type definitions for ticketlink
 */

/** One reference found in a message */
export interface TicketRef {
  id: string;                      // Capture group 1 (or the whole match)
  groups: Record<string, string>;  // Named groups that participated in the match
}

/** What a provider brings back for a ticket before formatting */
export interface FetchedTicket {
  title: string;
  status?: string;                 // e.g. "closed: fixed", "merged"
}

/** Turns (ticket id, raw title) into the display title */
export type Fixup = (id: string, title: string) => string;

export interface ChannelBinding {
  channel: string;                 // fnmatch-style glob, e.g. "#tor*"
  pattern?: RegExp;                // Extra trigger for this channel
  default: boolean;                // Also trigger on the bare `#NNNN` pattern
}

export interface BindOptions {
  pattern?: RegExp;
  default?: boolean;
}

export interface ProviderOptions {
  name: string;
  fixup?: Fixup;
  prefix?: string;
  postfix?: string;                // `{id}` is replaced with the ticket id
  pattern?: RegExp;                // Active in every channel
  minRepeatSeconds?: number;       // Default: 1800
  debugChannels?: string[];        // Globs that get debug tracing; default ['#*-test']
}

/** Everything the registry needs from a provider */
export interface TicketProvider {
  readonly name: string;
  readonly prefix?: string;
  readonly patternSource?: string;
  readonly minRepeatMs: number;
  bindings(): ChannelBinding[];
  addChannel(channel: string, opts?: BindOptions): void;
  refsFor(target: string, text: string): TicketRef[];
  lookup(id: string, ref?: TicketRef): Promise<string>;
  handleMessage(target: string, text: string, guard: RepeatGuard): Promise<string[]>;
  refresh?(): Promise<void>;
}

/** Identifies one sent reply for repeat suppression */
export interface SentKey {
  provider: string;
  target: string;
  ticketId: string;
}

export interface RepeatGuard {
  wasSentSince(key: SentKey, sinceMs: number): boolean;
  record(key: SentKey, atMs: number): void;
  /** Drop entries older than `beforeMs`; returns how many were removed */
  prune(beforeMs: number): number;
  /** Drop one entry, e.g. a reservation whose lookup failed */
  forget(key: SentKey): void;
}

export interface PreviewEntry {
  provider: string;
  refs: TicketRef[];
}

export type OutputFormat = 'table' | 'json';
