import { vi } from 'vitest';
import { PaatshalaClient } from '../src/paatshala-client.js';
import type { Topic } from '../src/types/paatshala.js';

export const BASE_URL = 'https://lms.example.test';

export interface FakeReply {
  body?: string;
  status?: number;
  /** Final URL after redirects; defaults to the requested URL */
  url?: string;
  headers?: Array<[string, string]>;
}

export function reply({ body = '', status = 200, url, headers = [] }: FakeReply = {}): Response {
  const response = new Response(body, { status, headers: new Headers(headers) });
  if (url) Object.defineProperty(response, 'url', { value: url });
  return response;
}

export type Handler = (url: string, init: RequestInit | undefined) => Response | Promise<Response>;

/**
 * Stand-in for global fetch. The first route whose pattern matches the URL answers;
 * anything else gets a 404.
 */
export function routeFetch(routes: Array<[string | RegExp, Handler]>) {
  return vi.fn(async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    for (const [pattern, handler] of routes) {
      if (typeof pattern === 'string' ? url.includes(pattern) : pattern.test(url)) return handler(url, init);
    }
    return reply({ body: 'not found', status: 404 });
  });
}

export function makeClient(): PaatshalaClient {
  return new PaatshalaClient({ baseUrl: BASE_URL, sessionCookie: 'test-cookie', retryBaseDelayMs: 0 });
}

/** URLs fetch was called with, in order */
export function calledUrls(mock: ReturnType<typeof routeFetch>): string[] {
  return mock.mock.calls.map(([input]) => (typeof input === 'string' ? input : input instanceof URL ? input.href : input.url));
}

export function makeTopic(sectionNumber: number, name: string, overrides: Partial<Topic> = {}): Topic {
  return {
    sectionNumber,
    dbId: String(100 + sectionNumber),
    name,
    visible: true,
    summary: '',
    restrictionSummary: '',
    activities: [],
    activityCount: 0,
    ...overrides,
  };
}
