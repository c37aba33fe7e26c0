// irc-framework ships no type declarations; this covers the parts ticketlink uses.
declare module 'irc-framework' {
  import { EventEmitter } from 'events';

  export interface ConnectOptions {
    host: string;
    port: number;
    nick: string;
    tls?: boolean;
    password?: string;
    username?: string;
    gecos?: string;
    auto_reconnect?: boolean;
    auto_reconnect_max_retries?: number;
  }

  export interface MessageEvent {
    nick: string;
    ident: string;
    hostname: string;
    target: string;
    message: string;
    type: string;
    reply(message: string): void;
  }

  export interface RegisteredEvent {
    nick: string;
  }

  export interface KickEvent {
    kicked: string;
    nick: string;
    channel: string;
    message: string;
  }

  export class Client extends EventEmitter {
    constructor(options?: Partial<ConnectOptions>);
    user: { nick: string };
    connected: boolean;
    connect(options?: Partial<ConnectOptions>): void;
    join(channel: string, key?: string): void;
    say(target: string, message: string): void;
    quit(message?: string): void;
  }
}
