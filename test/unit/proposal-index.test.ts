/**
 * Unit tests for ProposalIndexProvider
 */

import { FetchError, TicketNotFoundError } from '../../src/core/errors';
import { templateFixup } from '../../src/core/fixup';
import { DEFAULT_PROPOSAL_INDEX_URL, ProposalIndexProvider } from '../../src/core/providers/proposal-index';
import { FakeFetcher } from '../fixtures/fakes';

const INDEX_URL = 'https://specs.example.org/proposals/000-index.txt';

const INDEX = [
  'Proposals by number:',
  '',
  '000  Index of Proposals [META]',
  '001  The Proposal Process [META]',
  '224  Next-Generation Hidden Services [CLOSED]',
  '2240  Something Else Entirely [DRAFT]',
  '',
].join('\n');

describe('ProposalIndexProvider', () => {
  let fetcher: FakeFetcher;
  let provider: ProposalIndexProvider;

  beforeEach(() => {
    fetcher = new FakeFetcher();
    fetcher.pages.set(INDEX_URL, INDEX);
    provider = new ProposalIndexProvider({
      name: 'proposals',
      fixup: templateFixup('Prop#{id}: {title}'),
      indexUrl: INDEX_URL,
      refreshSeconds: 60,
      fetcher: fetcher.fetch,
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('defaults to the published index', () => {
    expect(new ProposalIndexProvider({ name: 'p' }).indexUrl).toBe(DEFAULT_PROPOSAL_INDEX_URL);
  });

  it('finds a proposal by number', async () => {
    await expect(provider.lookup('224')).resolves.toBe('Prop#224: Next-Generation Hidden Services [CLOSED]');
  });

  it('pads short numbers to three digits', async () => {
    await expect(provider.lookup('1')).resolves.toBe('Prop#1: The Proposal Process [META]');
  });

  it('ignores leading zeros beyond three digits', async () => {
    await expect(provider.lookup('0224')).resolves.toBe('Prop#0224: Next-Generation Hidden Services [CLOSED]');
    await expect(provider.lookup('00001')).resolves.toBe('Prop#00001: The Proposal Process [META]');
  });

  it('treats a non-numeric id as a missing ticket', async () => {
    await expect(provider.lookup('abc')).rejects.toThrow('[proposals] ticket abc not found: not a number');
  });

  it('does not match a longer number with the same start', async () => {
    fetcher.pages.set(INDEX_URL, '2240  Something Else Entirely [DRAFT]\n');
    await expect(provider.lookup('224')).rejects.toThrow('proposal not in index');
  });

  it('treats an unknown number as a missing ticket', async () => {
    await expect(provider.lookup('999')).rejects.toBeInstanceOf(TicketNotFoundError);
  });

  it('downloads the index once while it is fresh', async () => {
    await provider.lookup('224');
    await provider.lookup('1');
    expect(fetcher.calls).toHaveLength(1);
    expect(provider.hasIndex).toBe(true);
  });

  it('downloads the index again once it expires', async () => {
    const now = jest.spyOn(Date, 'now').mockReturnValue(1_000_000);
    await provider.lookup('224');

    now.mockReturnValue(1_000_000 + 61_000);
    await provider.lookup('224');
    expect(fetcher.calls).toHaveLength(2);
  });

  it('keeps the previous index when a refresh fails', async () => {
    const now = jest.spyOn(Date, 'now').mockReturnValue(1_000_000);
    await provider.refresh();

    fetcher.pages.set(INDEX_URL, new FetchError('GET failed', INDEX_URL, 503));
    now.mockReturnValue(1_000_000 + 61_000);
    await expect(provider.lookup('224')).resolves.toBe('Prop#224: Next-Generation Hidden Services [CLOSED]');
    expect(fetcher.calls).toHaveLength(2);
  });

  it('reports a missing ticket while no index has ever been downloaded', async () => {
    fetcher.pages.set(INDEX_URL, new FetchError('GET failed', INDEX_URL, 503));
    await expect(provider.lookup('224')).rejects.toThrow('no proposal index available');
    expect(provider.hasIndex).toBe(false);
  });
});
