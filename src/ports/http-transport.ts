export type HttpMethod = "GET" | "POST" | "PATCH" | "DELETE";

export type RequestAuth = { type: "owner" } | { type: "secret"; secret: string };

export interface TransportRequestOptions {
  body?: unknown;
  auth: RequestAuth;
}

export interface HttpTransportPort {
  /**
   * Performs one exchange. `path` is relative to the API root unless it is an
   * absolute http(s) URL. Resolves with the decoded JSON object.
   */
  request(method: HttpMethod, path: string, options: TransportRequestOptions): Promise<Record<string, unknown>>;
}

export interface FetchRequestInit {
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
}

export interface FetchResponseLike {
  status: number;
  text(): Promise<string>;
}

/** The subset of `fetch` the transport relies on. */
export type FetchLike = (url: string, init: FetchRequestInit) => Promise<FetchResponseLike>;
