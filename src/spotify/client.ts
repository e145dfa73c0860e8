import type { AuthenticatedPipeline } from "../http/pipeline";
import type { HttpMethod } from "../http/types";
import { SpotifyApiError, buildErrorMessage } from "../lib/errors";

export const SPOTIFY_API_BASE = "https://api.spotify.com/v1";

export function normalizeBaseUrl(input: string): string {
  return input.replace(/\/+$/, "");
}

/**
 * JSON helper over the authenticated pipeline. Paths are relative to the
 * API base ("me/playlists"); absolute URLs (paging `next` links) pass through.
 */
export class SpotifyClient {
  private readonly baseUrl: string;

  constructor(
    private readonly pipeline: AuthenticatedPipeline,
    baseUrl: string = SPOTIFY_API_BASE
  ) {
    this.baseUrl = normalizeBaseUrl(baseUrl);
  }

  resolveUrl(pathOrUrl: string): string {
    if (/^https?:\/\//.test(pathOrUrl)) return pathOrUrl;
    return `${this.baseUrl}/${pathOrUrl.replace(/^\/+/, "")}`;
  }

  async getJson<T>(path: string, signal?: AbortSignal): Promise<T> {
    return this.request<T>("GET", path, undefined, signal);
  }

  async postJson<T>(path: string, body: unknown, signal?: AbortSignal): Promise<T> {
    return this.request<T>("POST", path, body, signal);
  }

  private async request<T>(
    method: HttpMethod,
    path: string,
    body: unknown,
    signal: AbortSignal | undefined
  ): Promise<T> {
    const response = await this.pipeline.send({
      url: this.resolveUrl(path),
      method,
      headers: body !== undefined ? { "Content-Type": "application/json" } : undefined,
      body: body !== undefined ? JSON.stringify(body) : undefined,
      signal,
    });

    const bodyText = await response.text();

    if (!response.ok) {
      throw new SpotifyApiError(response.status, buildErrorMessage(response.status, bodyText));
    }

    if (!bodyText) {
      return undefined as T;
    }

    return JSON.parse(bodyText) as T;
  }
}
