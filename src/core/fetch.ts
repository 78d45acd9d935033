import { Agent, fetch, type Dispatcher } from "undici";

export interface HttpResponseLike {
  ok: boolean;
  status: number;
  url: string;
  headers: { get(name: string): string | null };
  arrayBuffer(): Promise<ArrayBuffer>;
}

export interface FetchInit {
  method: "GET";
  headers: Record<string, string>;
  redirect: "follow";
  signal?: AbortSignal;
  dispatcher?: Dispatcher;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<HttpResponseLike>;

let insecureAgent: Agent | undefined;

function getInsecureAgent(): Agent {
  if (!insecureAgent) {
    insecureAgent = new Agent({
      connect: {
        rejectUnauthorized: false,
      },
    });
  }
  return insecureAgent;
}

export function getFetchDispatcher(ignoreHttpsErrors: boolean): Dispatcher | undefined {
  if (!ignoreHttpsErrors) {
    return undefined;
  }
  return getInsecureAgent();
}

export const undiciFetch: FetchLike = (url, init) => fetch(url, init);
