import type { StoreId } from "../../types/contracts.js";
import type { FetchLike } from "./types.js";

export type WineSourceErrorCode =
  | "network_error"
  | "timeout"
  | "http_status"
  | "invalid_payload"
  | "not_configured";

export class WineSourceError extends Error {
  constructor(
    message: string,
    readonly store: StoreId,
    readonly code: WineSourceErrorCode,
    readonly status?: number
  ) {
    super(message);
    this.name = "WineSourceError";
  }
}

type SourceHTTPRequest = {
  store: StoreId;
  url: URL | string;
  fetchImpl: FetchLike;
  signal?: AbortSignal;
  method?: "GET" | "POST";
  headers?: Record<string, string>;
  body?: unknown;
};

export async function requestJSON(request: SourceHTTPRequest): Promise<unknown> {
  const response = await send({
    ...request,
    headers: { Accept: "application/json", ...request.headers }
  });

  try {
    return await response.json();
  } catch (error) {
    throw translateError(error, request.store, "Response body is not valid JSON");
  }
}

export async function requestText(request: SourceHTTPRequest): Promise<string> {
  const response = await send({
    ...request,
    headers: { Accept: "text/html,application/xhtml+xml", ...request.headers }
  });

  try {
    return await response.text();
  } catch (error) {
    throw translateError(error, request.store, "Failed to read response body");
  }
}

async function send(request: SourceHTTPRequest): Promise<Response> {
  const hasBody = request.body !== undefined;
  let response: Response;
  try {
    response = await request.fetchImpl(request.url, {
      method: request.method ?? (hasBody ? "POST" : "GET"),
      headers: {
        "Accept-Language": "es-ES,es;q=0.9",
        ...(hasBody ? { "Content-Type": "application/json" } : {}),
        ...request.headers
      },
      body: hasBody ? JSON.stringify(request.body) : undefined,
      signal: request.signal
    });
  } catch (error) {
    throw translateError(error, request.store, "Failed to reach store API");
  }

  if (!response.ok) {
    throw new WineSourceError(
      `Store API responded with status ${response.status}`,
      request.store,
      "http_status",
      response.status
    );
  }

  return response;
}

function translateError(error: unknown, store: StoreId, fallbackMessage: string): WineSourceError {
  if (error instanceof WineSourceError) {
    return error;
  }
  if (isAbortError(error)) {
    return new WineSourceError("Store API request aborted", store, "timeout");
  }
  if (error instanceof SyntaxError) {
    return new WineSourceError(fallbackMessage, store, "invalid_payload");
  }
  return new WineSourceError(fallbackMessage, store, "network_error");
}

export function isAbortError(error: unknown): boolean {
  if (typeof error !== "object" || error === null || !("name" in error)) {
    return false;
  }
  const name = typeof error.name === "string" ? error.name.toLowerCase() : "";
  return name === "aborterror" || name === "timeouterror";
}
