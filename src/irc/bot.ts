/// <reference path="../types/irc-framework.d.ts" />

/**
 * TicketBot — answers ticket references in IRC channels
 *
 * Wraps an irc-framework client: joins the configured channels once
 * registered, feeds every channel message to the registry and says each
 * resulting line back to the channel.
 */

import { Client, type ConnectOptions, type KickEvent, type MessageEvent, type RegisteredEvent } from 'irc-framework';
import type { IrcConfig } from '../core/app-config';
import { createLogger } from '../core/logger';
import type { TicketRegistry } from '../core/registry';

const log = createLogger('irc');

const MAX_LINE_LENGTH = 400;

/** The slice of irc-framework's Client the bot drives */
export interface IrcClient {
  user: { nick: string };
  connect(options: Partial<ConnectOptions>): void;
  join(channel: string): void;
  say(target: string, message: string): void;
  quit(message?: string): void;
  on(event: 'registered', listener: (event: RegisteredEvent) => void): unknown;
  on(event: 'privmsg', listener: (event: MessageEvent) => void): unknown;
  on(event: 'kick', listener: (event: KickEvent) => void): unknown;
  on(event: 'close', listener: () => void): unknown;
}

export function isChannel(target: string): boolean {
  return target.startsWith('#') || target.startsWith('&');
}

export function truncateLine(line: string, max = MAX_LINE_LENGTH): string {
  return line.length <= max ? line : `${line.slice(0, max - 1)}…`;
}

export class TicketBot {
  private readonly client: IrcClient;
  private stopped = false;

  constructor(
    private readonly config: IrcConfig,
    private readonly registry: TicketRegistry,
    client: IrcClient = new Client(),
  ) {
    this.client = client;

    this.client.on('registered', event => {
      log.info({ nick: event.nick, channels: this.config.channels }, 'Registered with server');
      for (const channel of this.config.channels) {
        this.client.join(channel);
      }
    });

    this.client.on('privmsg', event => {
      this.handle(event).catch(err => {
        log.error({ err, target: event.target }, 'Failed to handle message');
      });
    });

    this.client.on('kick', event => {
      if (event.kicked !== this.client.user.nick || this.stopped) return;
      log.warn({ channel: event.channel, by: event.nick, reason: event.message }, 'Kicked, rejoining');
      this.client.join(event.channel);
    });

    this.client.on('close', () => {
      log.info('Connection closed');
    });
  }

  start(): void {
    log.info({ host: this.config.host, port: this.config.port, tls: this.config.tls }, 'Connecting');
    this.client.connect({
      host: this.config.host,
      port: this.config.port,
      tls: this.config.tls,
      nick: this.config.nick,
      password: this.config.password,
      username: this.config.username ?? this.config.nick,
      gecos: this.config.realname ?? 'ticketlink',
      auto_reconnect: true,
    });
  }

  /** Answer one message; private messages and our own lines are ignored */
  async handle(event: Pick<MessageEvent, 'nick' | 'target' | 'message'>): Promise<void> {
    if (!isChannel(event.target)) return;
    if (event.nick === this.client.user.nick) return;

    const lines = await this.registry.handleMessage(event.target, event.message);
    for (const line of lines) {
      this.client.say(event.target, truncateLine(line));
    }
  }

  stop(message = 'ticketlink shutting down'): void {
    this.stopped = true;
    this.client.quit(message);
  }
}
