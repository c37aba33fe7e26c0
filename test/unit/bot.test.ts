/**
 * Unit tests for the IRC bot, with an in-process client
 */

import { EventEmitter } from 'events';
import type { IrcConfig } from '../../src/core/app-config';
import { templateFixup } from '../../src/core/fixup';
import { TicketRegistry } from '../../src/core/registry';
import { TicketBot, isChannel, truncateLine, type IrcClient } from '../../src/irc/bot';
import { StubProvider } from '../fixtures/fakes';

class FakeIrcClient extends EventEmitter implements IrcClient {
  user = { nick: 'ticketbot' };
  connect = jest.fn();
  join = jest.fn();
  say = jest.fn();
  quit = jest.fn();
}

const config: IrcConfig = {
  host: 'irc.example.org',
  port: 6697,
  tls: true,
  nick: 'ticketbot',
  channels: ['#tor', '#debian-devel'],
};

const flush = () => new Promise(resolve => setImmediate(resolve));

describe('isChannel', () => {
  it('recognises # and & channels', () => {
    expect(isChannel('#tor')).toBe(true);
    expect(isChannel('&local')).toBe(true);
    expect(isChannel('ticketbot')).toBe(false);
  });
});

describe('truncateLine', () => {
  it('leaves short lines alone', () => {
    expect(truncateLine('short', 10)).toBe('short');
  });

  it('cuts long lines with an ellipsis', () => {
    expect(truncateLine('abcdefghijkl', 10)).toBe('abcdefghi…');
  });
});

describe('TicketBot', () => {
  let client: FakeIrcClient;
  let provider: StubProvider;
  let bot: TicketBot;

  beforeEach(() => {
    client = new FakeIrcClient();
    provider = new StubProvider({ name: 'stub', prefix: 'stub', fixup: templateFixup('#{id}: {title}') });
    provider.titles.set('12', { title: 'First' });

    const registry = new TicketRegistry();
    registry.register(provider);
    bot = new TicketBot(config, registry, client);
  });

  it('connects with the configured identity', () => {
    bot.start();
    expect(client.connect).toHaveBeenCalledWith({
      host: 'irc.example.org',
      port: 6697,
      tls: true,
      nick: 'ticketbot',
      password: undefined,
      username: 'ticketbot',
      gecos: 'ticketlink',
      auto_reconnect: true,
    });
  });

  it('joins every channel once registered', () => {
    client.emit('registered', { nick: 'ticketbot' });
    expect(client.join.mock.calls).toEqual([['#tor'], ['#debian-devel']]);
  });

  it('answers a channel message', async () => {
    client.emit('privmsg', { nick: 'alice', target: '#tor', message: 'look at stub#12' });
    await flush();
    expect(client.say).toHaveBeenCalledWith('#tor', 'stub#12: First');
  });

  it('ignores private messages', async () => {
    await bot.handle({ nick: 'alice', target: 'ticketbot', message: 'stub#12' });
    expect(client.say).not.toHaveBeenCalled();
  });

  it('ignores its own messages', async () => {
    await bot.handle({ nick: 'ticketbot', target: '#tor', message: 'stub#12' });
    expect(client.say).not.toHaveBeenCalled();
  });

  it('truncates long replies', async () => {
    provider.titles.set('13', { title: 'x'.repeat(500) });
    await bot.handle({ nick: 'alice', target: '#tor', message: 'stub#13' });
    expect(client.say.mock.calls[0][1]).toHaveLength(400);
  });

  it('rejoins after being kicked', () => {
    client.emit('kick', { kicked: 'ticketbot', nick: 'op', channel: '#tor', message: 'bye' });
    expect(client.join).toHaveBeenCalledWith('#tor');
  });

  it('does not rejoin when someone else is kicked', () => {
    client.emit('kick', { kicked: 'alice', nick: 'op', channel: '#tor', message: 'bye' });
    expect(client.join).not.toHaveBeenCalled();
  });

  it('stays out after stop', () => {
    bot.stop();
    expect(client.quit).toHaveBeenCalledWith('ticketlink shutting down');
    client.emit('kick', { kicked: 'ticketbot', nick: 'op', channel: '#tor', message: 'bye' });
    expect(client.join).not.toHaveBeenCalled();
  });
});
