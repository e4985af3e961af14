import fetch from 'node-fetch';

export interface HttpRequestInit {
  method?: string;
  headers?: Record<string, string>;
  body?: string;
  /** Milliseconds; node-fetch aborts the request after this. */
  timeout?: number;
}

export interface HttpResponse {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

export type HttpFetch = (url: string, init?: HttpRequestInit) => Promise<HttpResponse>;

export const defaultFetch: HttpFetch = (url, init) => fetch(url, init);
