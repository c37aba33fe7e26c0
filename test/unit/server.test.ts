/**
 * Unit tests for the HTTP API, driven through fastify.inject
 */

import type { FastifyInstance } from 'fastify';
import { SentLog } from '../../src/core/db';
import { templateFixup } from '../../src/core/fixup';
import { TicketRegistry } from '../../src/core/registry';
import { createServer } from '../../src/server/app';
import { StubProvider } from '../fixtures/fakes';

describe('HTTP API', () => {
  let server: FastifyInstance;
  let provider: StubProvider;

  beforeEach(async () => {
    provider = new StubProvider({ name: 'tracker.example.org/main', prefix: 'main', fixup: templateFixup('#{id}: {title}') });
    provider.titles.set('42', { title: 'Crash on start' });
    provider.failures.set('500', new Error('tracker down'));

    const registry = new TicketRegistry();
    registry.register(provider);
    registry.bind('tracker.example.org/main', '#main*', { default: true });

    server = await createServer({ port: 0, host: '127.0.0.1', registry });
  });

  afterEach(async () => {
    await server.close();
  });

  it('GET /health', async () => {
    const res = await server.inject({ method: 'GET', url: '/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok', providers: 1 });
  });

  it('GET /api/providers', async () => {
    const res = await server.inject({ method: 'GET', url: '/api/providers' });
    expect(res.json()).toEqual({
      providers: [{
        name: 'tracker.example.org/main',
        prefix: 'main',
        pattern: provider.patternSource,
        channels: ['#main*'],
      }],
    });
  });

  it('GET /api/channels/:channel', async () => {
    const res = await server.inject({ method: 'GET', url: `/api/channels/${encodeURIComponent('#main-dev')}` });
    expect(res.json()).toEqual({
      channel: '#main-dev',
      rules: [
        { provider: 'tracker.example.org/main', channel: '*', pattern: provider.patternSource, default: false },
        { provider: 'tracker.example.org/main', channel: '#main*', default: true },
      ],
    });
  });

  it('POST /api/preview', async () => {
    const res = await server.inject({
      method: 'POST',
      url: '/api/preview',
      payload: { channel: '#main', message: 'main#42 and #12345' },
    });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      channel: '#main',
      matches: [{
        provider: 'tracker.example.org/main',
        refs: [{ id: '42', groups: {} }, { id: '12345', groups: {} }],
      }],
    });
    expect(provider.fetchCalls).toEqual([]);
  });

  it('POST /api/preview rejects a body without a channel', async () => {
    const res = await server.inject({ method: 'POST', url: '/api/preview', payload: { message: 'main#42' } });
    expect(res.statusCode).toBe(400);
  });

  describe('GET /api/lookup', () => {
    const lookup = (provider: string, id: string) =>
      server.inject({ method: 'GET', url: '/api/lookup', query: { provider, id } });

    it('returns the formatted line', async () => {
      const res = await lookup('tracker.example.org/main', '42');
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ provider: 'tracker.example.org/main', id: '42', line: 'main#42: Crash on start' });
    });

    it('returns 404 for a missing ticket', async () => {
      const res = await lookup('tracker.example.org/main', '99');
      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ error: '[tracker.example.org/main] ticket 99 not found' });
    });

    it('returns 404 for an unknown provider', async () => {
      const res = await lookup('nope', '1');
      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ error: 'Unknown provider "nope"' });
    });

    it('returns 502 when the tracker fails', async () => {
      const res = await lookup('tracker.example.org/main', '500');
      expect(res.statusCode).toBe(502);
      expect(res.json()).toEqual({ error: 'Lookup failed: tracker down' });
    });

    it('requires both parameters', async () => {
      const res = await server.inject({ method: 'GET', url: '/api/lookup?provider=nope' });
      expect(res.statusCode).toBe(400);
    });
  });

  describe('GET /api/sent', () => {
    it('returns 404 without a sent log', async () => {
      const res = await server.inject({ method: 'GET', url: '/api/sent' });
      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ error: 'No sent log configured' });
    });

    it('lists the most recent replies', async () => {
      const sentLog = new SentLog(':memory:');
      const registry = new TicketRegistry(sentLog);
      registry.register(provider);
      const withLog = await createServer({ port: 0, host: '127.0.0.1', registry, sentLog });

      try {
        await registry.handleMessage('#main', 'main#42');
        sentLog.record({ provider: 'other', target: '#main', ticketId: '7' }, 1);

        const res = await withLog.inject({ method: 'GET', url: '/api/sent', query: { limit: '1' } });
        expect(res.statusCode).toBe(200);
        expect(res.json()).toEqual({
          sent: [{ provider: 'tracker.example.org/main', target: '#main', ticketId: '42', sentAt: expect.any(Number) }],
        });
      } finally {
        await withLog.close();
        sentLog.close();
      }
    });

    it('rejects a limit out of range', async () => {
      const res = await server.inject({ method: 'GET', url: '/api/sent?limit=0' });
      expect(res.statusCode).toBe(400);
    });
  });
});
