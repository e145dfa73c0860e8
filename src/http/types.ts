export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

/**
 * An outbound request before credentials are attached.
 * Headers are plain so the pipeline can re-send the same request after a refresh.
 */
export type OutboundRequest = {
  url: string;
  method?: HttpMethod | undefined;
  headers?: Record<string, string> | undefined;
  body?: string | undefined;
  signal?: AbortSignal | undefined;
};
