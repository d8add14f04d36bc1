import type { IncomingMessage, RequestListener, ServerResponse } from "node:http";

/**
 * Fetch-style request handler.
 */
export type FetchHandler = (request: Request) => Promise<Response>;

/**
 * Reads a Node request into a fetch `Request`.
 *
 * @param incoming - Node request.
 * @param origin - Origin used to build the absolute request URL.
 */
export async function toFetchRequest(incoming: IncomingMessage, origin: string): Promise<Request> {
  const headers = new Headers();
  for (const [name, value] of Object.entries(incoming.headers)) {
    if (Array.isArray(value)) {
      for (const item of value) {
        headers.append(name, item);
      }
    } else if (value !== undefined) {
      headers.set(name, value);
    }
  }

  const method = incoming.method ?? "GET";
  const chunks: Buffer[] = [];
  for await (const chunk of incoming) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }

  const hasBody = method !== "GET" && method !== "HEAD";
  return new Request(new URL(incoming.url ?? "/", origin), {
    method,
    headers,
    body: hasBody ? Buffer.concat(chunks) : undefined,
  });
}

/**
 * Writes a fetch `Response` onto a Node response.
 */
export async function writeFetchResponse(
  response: Response,
  outgoing: ServerResponse,
): Promise<void> {
  const headers: Record<string, string> = {};
  response.headers.forEach((value, name) => {
    headers[name] = value;
  });

  outgoing.writeHead(response.status, headers);
  outgoing.end(Buffer.from(await response.arrayBuffer()));
}

/**
 * Bridges `node:http` onto a fetch-style handler.
 *
 * @param handler - Request handler.
 * @param logError - Logger for failures outside the handler's own mapping.
 */
export function createRequestListener(
  handler: FetchHandler,
  logError: (message: string) => void = console.error,
): RequestListener {
  return (incoming, outgoing) => {
    const origin = `http://${incoming.headers.host ?? "localhost"}`;

    toFetchRequest(incoming, origin)
      .then(handler)
      .then((response) => writeFetchResponse(response, outgoing))
      .catch((error: unknown) => {
        const details = error instanceof Error ? error.stack ?? error.message : String(error);
        logError(`[webhook-api] unhandled request failure: ${details}`);
        if (!outgoing.headersSent) {
          outgoing.writeHead(500, { "content-type": "application/json" });
        }
        outgoing.end(JSON.stringify({ status: "error", error: { code: "internal_error", message: "Internal error" } }));
      });
  };
}
