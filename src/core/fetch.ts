import { Agent, fetch, type RequestInit } from "undici";

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

export function getFetchDispatcher(ignoreHttpsErrors: boolean): Agent | undefined {
  if (!ignoreHttpsErrors) {
    return undefined;
  }
  return getInsecureAgent();
}

export interface HttpResponseLike {
  ok: boolean;
  status: number;
  text(): Promise<string>;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export interface HttpRequestLike {
  method: string;
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
}

export type FetchLike = (url: string, init: HttpRequestLike) => Promise<HttpResponseLike>;

export function createFetch(ignoreHttpsErrors: boolean): FetchLike {
  return (url, init) => {
    const request: RequestInit = {
      method: init.method,
      headers: init.headers,
      body: init.body,
      signal: init.signal,
      redirect: "follow",
      dispatcher: getFetchDispatcher(ignoreHttpsErrors),
    };
    return fetch(url, request);
  };
}

/** The timeout covers reading the body as well as receiving the headers. */
export async function fetchWithTimeout<T>(
  fetchFn: FetchLike,
  url: string,
  init: Omit<HttpRequestLike, "signal">,
  timeoutMs: number,
  read: (response: HttpResponseLike) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetchFn(url, { ...init, signal: controller.signal });
    return await read(response);
  } finally {
    clearTimeout(timeout);
  }
}
