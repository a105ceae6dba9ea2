import { SerializationError, TransportError, describeError } from "../../domain/errors";

export interface HttpRequestInit {
  method: "POST";
  headers: Record<string, string>;
  body?: string;
}

export interface HttpResponseLike {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
}

/** Narrow slice of `fetch` so tests can hand in a plain function. */
export type FetchLike = (url: string, init: HttpRequestInit) => Promise<HttpResponseLike>;

export const defaultFetch: FetchLike = (url, init) => fetch(url, init);

export interface PostJsonRequest {
  headers?: Record<string, string>;
  body?: unknown;
}

function encodeBody(label: string, body: unknown): string {
  try {
    return JSON.stringify(body);
  } catch (err) {
    throw new SerializationError(`Failed to encode ${label} request body`, { cause: err });
  }
}

/**
 * POSTs to `url` and returns the decoded JSON body, or `undefined` when the
 * server sent no body at all. Anything that goes wrong on the wire, a non-2xx
 * status or a body that is not JSON becomes a TransportError.
 */
export async function postJson(
  fetchImpl: FetchLike,
  url: string,
  label: string,
  request: PostJsonRequest = {}
): Promise<unknown> {
  const headers: Record<string, string> = { ...request.headers };
  const init: HttpRequestInit = { method: "POST", headers };
  if (request.body !== undefined) {
    headers["Content-Type"] = "application/json";
    init.body = encodeBody(label, request.body);
  }

  let res: HttpResponseLike;
  try {
    res = await fetchImpl(url, init);
  } catch (err) {
    throw new TransportError(`${label} request failed: ${describeError(err)}`, { cause: err });
  }

  if (!res.ok) {
    throw new TransportError(`${label} failed: HTTP ${res.status} ${res.statusText}`.trim());
  }

  let text: string;
  try {
    text = await res.text();
  } catch (err) {
    throw new TransportError(`${label} response could not be read: ${describeError(err)}`, {
      cause: err,
    });
  }

  if (!text.trim()) {
    return undefined;
  }

  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (err) {
    throw new TransportError(`${label} returned non-JSON payload`, { cause: err });
  }
}
