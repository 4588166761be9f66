import type { ReadableStream } from "node:stream/web";
import { Agent, fetch as undiciFetch } from "undici";

export interface HttpRequestInit {
  method: "GET" | "HEAD";
  headers: Record<string, string>;
  signal: AbortSignal;
}

export interface HttpResponseLike {
  ok: boolean;
  status: number;
  url: string;
  headers: { get(name: string): string | null };
  body: ReadableStream<Uint8Array> | null;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: HttpRequestInit) => Promise<HttpResponseLike>;

const agents = new Map<boolean, Agent>();

/** Pooled keep-alive agent shared by every source, one per TLS mode. */
function agentFor(ignoreHttpsErrors: boolean): Agent {
  let agent = agents.get(ignoreHttpsErrors);
  if (!agent) {
    agent = new Agent({
      keepAliveTimeout: 10_000,
      connect: { rejectUnauthorized: !ignoreHttpsErrors },
    });
    agents.set(ignoreHttpsErrors, agent);
  }
  return agent;
}

export function createFetch(ignoreHttpsErrors: boolean): FetchLike {
  const dispatcher = agentFor(ignoreHttpsErrors);
  return (url, init) => undiciFetch(url, { ...init, redirect: "follow", dispatcher });
}

/**
 * Failure kind for a non-2xx status: request timeouts, rate limits and server
 * errors may clear up later, any other client error is a confirmed miss.
 */
export function classifyHttpFailure(status: number): "not-found" | "transient-error" {
  if (status === 408 || status === 429 || status >= 500) {
    return "transient-error";
  }
  return "not-found";
}
