export interface HttpResponseLike {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
  text(): Promise<string>;
}

export interface HttpRequestInitLike {
  method?: string;
  headers?: Record<string, string>;
  timeoutMs?: number;
}

/** Transport used by the tools; injectable so tests never touch the network. */
export type HttpClient = (url: string, init?: HttpRequestInitLike) => Promise<HttpResponseLike>;

export const fetchHttpClient: HttpClient = async (url, init?: HttpRequestInitLike) => {
  const response = await fetch(url, {
    method: init?.method ?? 'GET',
    headers: init?.headers,
    signal: init?.timeoutMs ? AbortSignal.timeout(init.timeoutMs) : undefined,
  });

  return {
    ok: response.ok,
    status: response.status,
    json: () => response.json(),
    text: () => response.text(),
  };
};
