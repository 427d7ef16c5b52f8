import type { HttpTransport } from '../lib/http-client.js';

export type FakeReply = { status: number; body?: string } | Error;

export interface FakeTransport {
  transport: HttpTransport;
  calls: string[];
}

/**
 * In-process stand-in for the HTTP transport. Each URL answers with its
 * replies in turn, repeating the last one; unknown URLs get the fallback,
 * which by default is a connection error.
 */
export function createFakeTransport(
  routes: Record<string, FakeReply | FakeReply[]>,
  fallback: FakeReply = new Error('connect ECONNREFUSED'),
): FakeTransport {
  const calls: string[] = [];
  const served = new Map<string, number>();

  const transport: HttpTransport = async (url) => {
    calls.push(url);
    const route = routes[url] ?? fallback;
    const replies = Array.isArray(route) ? route : [route];
    const count = served.get(url) ?? 0;
    served.set(url, count + 1);

    const reply = replies[Math.min(count, replies.length - 1)];
    if (reply instanceof Error) throw reply;
    return { status: reply.status, body: reply.body ?? '' };
  };

  return { transport, calls };
}

export function page(body: string): FakeReply {
  return { status: 200, body };
}
