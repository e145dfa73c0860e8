import { vi } from "vitest";
import type { AuthenticatedPipeline } from "../src/http/pipeline";
import type { OutboundRequest } from "../src/http/types";
import { SpotifyClient } from "../src/spotify/client";
import { jsonResponse } from "./helpers";

export type Route = (request: OutboundRequest) => Response | undefined;

/**
 * A SpotifyClient over an in-process pipeline that answers from `routes`,
 * first match wins; unmatched requests get a 404.
 */
export function fakeSpotify(routes: Route[]) {
  const send = vi.fn(async (request: OutboundRequest) => {
    for (const route of routes) {
      const response = route(request);
      if (response) return response;
    }
    return jsonResponse({ error: { status: 404, message: "Not found" } }, 404);
  });
  const pipeline: AuthenticatedPipeline = { sessionId: "default", send };
  const client = new SpotifyClient(pipeline, "https://api.spotify.test/v1/");
  return { client, send };
}

export function on(method: string, path: string, body: unknown, status = 200): Route {
  const url = `https://api.spotify.test/v1/${path}`;
  return (request) =>
    (request.method ?? "GET") === method && request.url === url ? jsonResponse(body, status) : undefined;
}

export function bodyOf(request: OutboundRequest | undefined): unknown {
  return request?.body ? JSON.parse(request.body) : undefined;
}
