import { vi } from 'vitest';
import type { Mock } from 'vitest';
import type { FetchLike } from '../../src/infrastructure/http/fetch-client.js';
import type { Clock } from '../../src/runtime/ports/clock.js';

/**
 * fetch spy. Answers every call with `respond`; by default a 200 with an
 * empty JSON object.
 */
export function createFakeFetch(
  respond: (url: string, init?: RequestInit) => Response | Promise<Response> = () => jsonResponse({})
): Mock<FetchLike> {
  return vi.fn<FetchLike>(async (url, init) => respond(url, init));
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

/** Clock moved by hand; `sleep` only advances time. */
export class ManualClock implements Clock {
  constructor(private current = 1_700_000_000_000) {}

  nowMs(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  async sleep(ms: number): Promise<void> {
    this.current += ms;
  }
}
