/**
 * HTTP Transport
 * Native fetch with separate connect, read and total timeouts.
 * A request started is never cancelled from outside; only its timeouts end it early.
 */

import { TimeoutPhase, TransportRequest, TransportResponse, HttpTransport } from './fetch.types';

export type TransportErrorKind = 'timeout' | 'network';

export class TransportError extends Error {
  constructor(
    message: string,
    public readonly kind: TransportErrorKind,
    public readonly phase?: TimeoutPhase,
    public readonly code?: string
  ) {
    super(message);
    this.name = 'TransportError';
  }
}

export class FetchTransport implements HttpTransport {
  async request(request: TransportRequest): Promise<TransportResponse> {
    const { timeouts } = request;
    const controller = new AbortController();
    const state: { expired: TimeoutPhase | null } = { expired: null };

    const expire = (phase: TimeoutPhase) => () => {
      state.expired = phase;
      controller.abort();
    };

    const totalTimer = setTimeout(expire('total'), timeouts.totalMs);
    let phaseTimer = setTimeout(expire('connect'), timeouts.connectMs);

    try {
      const response = await fetch(request.url, {
        method: 'GET',
        headers: request.headers,
        redirect: 'follow',
        signal: controller.signal,
      });
      clearTimeout(phaseTimer);
      phaseTimer = setTimeout(expire('read'), timeouts.readMs);

      const body = Buffer.from(await response.arrayBuffer());

      return {
        status: response.status,
        url: response.url || request.url,
        contentType: response.headers.get('content-type') || '',
        body,
        retryAfterMs: parseRetryAfter(response.headers.get('retry-after')),
      };
    } catch (error: unknown) {
      if (state.expired) {
        const budget =
          state.expired === 'connect' ? timeouts.connectMs : state.expired === 'read' ? timeouts.readMs : timeouts.totalMs;
        throw new TransportError(`${state.expired} timeout after ${budget}ms`, 'timeout', state.expired);
      }
      throw new TransportError(describeNetworkError(error), 'network', undefined, networkErrorCode(error));
    } finally {
      clearTimeout(totalTimer);
      clearTimeout(phaseTimer);
    }
  }
}

/**
 * Retry-After as milliseconds (delta-seconds or HTTP date)
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10) * 1000;
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

function networkErrorCode(error: unknown): string | undefined {
  const cause = error instanceof Error ? error.cause : undefined;
  for (const candidate of [cause, error]) {
    if (candidate instanceof Error && 'code' in candidate && typeof candidate.code === 'string') {
      return candidate.code;
    }
  }
  return undefined;
}

function describeNetworkError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  const code = networkErrorCode(error);
  const cause = error.cause instanceof Error ? error.cause.message : '';
  return [error.message, code, cause].filter((part) => part && part.length > 0).join(': ');
}

export const fetchTransport = new FetchTransport();
