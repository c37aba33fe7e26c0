/**
 * Unit tests for the HTTP fetcher
 */

import { FetchError } from '../../src/core/errors';
import { charsetFromContentType, createFetcher, decodeBody, type HttpGet } from '../../src/core/fetcher';

type GetResult = Awaited<ReturnType<HttpGet>>;

function response(status: number, body: string, contentType = 'text/html; charset=utf-8'): GetResult {
  return { status, headers: { 'content-type': contentType }, data: Buffer.from(body, 'utf-8') };
}

describe('charsetFromContentType', () => {
  it('extracts and lowercases the charset', () => {
    expect(charsetFromContentType('text/html; charset="ISO-8859-1"')).toBe('iso-8859-1');
    expect(charsetFromContentType('text/plain;charset=UTF-8')).toBe('utf-8');
  });

  it('returns undefined without a charset', () => {
    expect(charsetFromContentType('text/html')).toBeUndefined();
    expect(charsetFromContentType(undefined)).toBeUndefined();
  });
});

describe('decodeBody', () => {
  it('decodes with the declared charset', () => {
    expect(decodeBody(Uint8Array.from([0x63, 0x61, 0x66, 0xe9]), 'text/html; charset=iso-8859-1')).toBe('café');
  });

  it('defaults to utf-8', () => {
    expect(decodeBody(Buffer.from('café', 'utf-8'))).toBe('café');
  });

  it('falls back to utf-8 for an unknown charset', () => {
    expect(decodeBody(Buffer.from('café', 'utf-8'), 'text/html; charset=x-no-such-charset')).toBe('café');
  });
});

describe('createFetcher', () => {
  const url = 'https://tracker.example.org/ticket/1';
  let get: jest.Mock<ReturnType<HttpGet>, Parameters<HttpGet>>;

  beforeEach(() => {
    get = jest.fn<ReturnType<HttpGet>, Parameters<HttpGet>>();
  });

  it('returns the decoded page', async () => {
    get.mockResolvedValue(response(200, '<title>One</title>'));
    const page = await createFetcher(get)(url);

    expect(page).toEqual({
      url,
      status: 200,
      contentType: 'text/html; charset=utf-8',
      body: '<title>One</title>',
    });
  });

  it('requests raw bytes and merges extra headers', async () => {
    get.mockResolvedValue(response(200, '{}'));
    await createFetcher(get)(url, { headers: { 'PRIVATE-TOKEN': 'test-token' }, timeout: 1000 });

    const config = get.mock.calls[0][1];
    expect(config.responseType).toBe('arraybuffer');
    expect(config.timeout).toBe(1000);
    expect(config.headers).toEqual({
      'User-Agent': expect.stringContaining('ticketlink'),
      'PRIVATE-TOKEN': 'test-token',
    });
  });

  it('fails at once on a client error', async () => {
    get.mockResolvedValue(response(404, 'gone'));
    const promise = createFetcher(get)(url, { retryDelay: 0 });

    await expect(promise).rejects.toBeInstanceOf(FetchError);
    await expect(promise).rejects.toMatchObject({ status: 404, url });
    expect(get).toHaveBeenCalledTimes(1);
  });

  it('retries server errors', async () => {
    get
      .mockResolvedValueOnce(response(503, 'busy'))
      .mockResolvedValueOnce(response(503, 'busy'))
      .mockResolvedValueOnce(response(200, 'ok'));

    const page = await createFetcher(get)(url, { retryDelay: 0 });
    expect(page.body).toBe('ok');
    expect(get).toHaveBeenCalledTimes(3);
  });

  it('gives up after maxRetries', async () => {
    get.mockResolvedValue(response(500, 'broken'));
    await expect(createFetcher(get)(url, { maxRetries: 0 })).rejects.toMatchObject({ status: 500 });
    expect(get).toHaveBeenCalledTimes(1);
  });

  it('retries network errors and reports the last one', async () => {
    get.mockRejectedValue(new Error('ECONNRESET'));

    await expect(createFetcher(get)(url, { retryDelay: 0 })).rejects.toThrow(`GET ${url} failed: ECONNRESET`);
    expect(get).toHaveBeenCalledTimes(3);
  });
});
