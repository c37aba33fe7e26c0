/**
 * Unit tests for scheduled maintenance
 */

import { ConfigError } from '../../src/core/errors';
import { ProposalIndexProvider } from '../../src/core/providers/proposal-index';
import { TicketRegistry } from '../../src/core/registry';
import { MemoryRepeatGuard } from '../../src/core/repeat-guard';
import { runMaintenance, startScheduler } from '../../src/server/scheduler';
import { FakeFetcher, StubProvider } from '../fixtures/fakes';

describe('runMaintenance', () => {
  it('refreshes indexes and prunes the sent log', async () => {
    const fetcher = new FakeFetcher();
    fetcher.pages.set('https://specs.example.org/index.txt', '001  The Proposal Process\n');

    const guard = new MemoryRepeatGuard();
    const registry = new TicketRegistry(guard);
    registry.register(new StubProvider({ name: 'stub', minRepeatSeconds: 60 }));
    registry.register(new ProposalIndexProvider({
      name: 'proposals',
      indexUrl: 'https://specs.example.org/index.txt',
      minRepeatSeconds: 60,
      fetcher: fetcher.fetch,
    }));

    guard.record({ provider: 'stub', target: '#chan', ticketId: '1' }, 0);
    guard.record({ provider: 'stub', target: '#chan', ticketId: '2' }, Date.now());

    await expect(runMaintenance(registry)).resolves.toEqual({ refreshed: 1, pruned: 1 });
    expect(fetcher.calls).toHaveLength(1);
  });
});

describe('startScheduler', () => {
  it('rejects an invalid cron expression', () => {
    expect(() => startScheduler({ cronExpression: 'not a cron', registry: new TicketRegistry() })).toThrow(ConfigError);
  });

  it('starts and stops', () => {
    const handle = startScheduler({ cronExpression: '0 0 1 1 *', registry: new TicketRegistry() });
    expect(handle.isRunning()).toBe(false);
    handle.stop();
  });
});
