/**
 * HTTP Transport Tests
 * Native fetch is replaced with in-process stand-ins
 */

import { FetchTransport, TransportError, parseRetryAfter } from '../http-transport';
import { classifyError } from '../fetch.errors';
import { FetchErrorType } from '../fetch.types';

const TIMEOUTS = { connectMs: 20, readMs: 20, totalMs: 1000 };

describe('FetchTransport', () => {
  let transport: FetchTransport;

  beforeEach(() => {
    transport = new FetchTransport();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should return status, content type and body', async () => {
    const fetchMock = jest.spyOn(global, 'fetch').mockResolvedValue(
      new Response('<p>hi</p>', { status: 200, headers: { 'content-type': 'text/html', 'retry-after': '5' } })
    );

    const response = await transport.request({
      url: 'https://example.test/p1.html',
      headers: { 'User-Agent': 'TestCrawler/1.0' },
      timeouts: TIMEOUTS,
    });

    expect(response.status).toBe(200);
    expect(response.url).toBe('https://example.test/p1.html');
    expect(response.contentType).toBe('text/html');
    expect(response.body.toString('utf8')).toBe('<p>hi</p>');
    expect(response.retryAfterMs).toBe(5000);
    expect(fetchMock).toHaveBeenCalledWith(
      'https://example.test/p1.html',
      expect.objectContaining({ method: 'GET', headers: { 'User-Agent': 'TestCrawler/1.0' } })
    );
  });

  it('should raise a connect timeout when headers never arrive', async () => {
    jest.spyOn(global, 'fetch').mockImplementation(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
        })
    );

    const request = transport.request({ url: 'https://example.test/slow', headers: {}, timeouts: TIMEOUTS });

    await expect(request).rejects.toMatchObject({ kind: 'timeout', phase: 'connect' });
  });

  it('should report network failures with their error code', async () => {
    const cause = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:443'), { code: 'ECONNREFUSED' });
    jest.spyOn(global, 'fetch').mockRejectedValue(new TypeError('fetch failed', { cause }));

    const error = await transport
      .request({ url: 'https://example.test/down', headers: {}, timeouts: TIMEOUTS })
      .catch((thrown: unknown) => thrown);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ kind: 'network', code: 'ECONNREFUSED' });
  });

  it('should treat an abort it did not cause as a retryable network failure', async () => {
    jest.spyOn(global, 'fetch').mockRejectedValue(new Error('This operation was aborted'));

    const error = await transport
      .request({ url: 'https://example.test/cut', headers: {}, timeouts: TIMEOUTS })
      .catch((thrown: unknown) => thrown);

    expect(error).toMatchObject({ kind: 'network', message: 'This operation was aborted' });
    expect(classifyError(error)).toEqual({
      type: FetchErrorType.NETWORK_ERROR,
      message: 'Network connection failed (This operation was aborted)',
      retryable: true,
    });
  });
});

describe('parseRetryAfter', () => {
  it('should read delta seconds and HTTP dates', () => {
    expect(parseRetryAfter('120')).toBe(120000);
    expect(
      parseRetryAfter('Wed, 21 Oct 2015 07:28:00 GMT', Date.parse('Wed, 21 Oct 2015 07:27:00 GMT'))
    ).toBe(60000);
  });

  it('should ignore missing or unreadable values', () => {
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter('soon')).toBeUndefined();
  });
});
