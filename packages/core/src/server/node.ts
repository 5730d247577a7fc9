/**
 * Node.js HTTP adapter: turns `node:http` traffic into fetch-style
 * `Request`/`Response` pairs.
 */

import { createServer } from "node:http";
import type { IncomingHttpHeaders } from "node:http";
import type { Logger, ServerHandle } from "../app/types.ts";
import { BadRequestError } from "../errors/http.ts";
import { errorToResponse } from "../errors/transformer.ts";
import { DEFAULT_CONTENT_TYPE, DEFAULT_SERVER_NAME } from "../config/config.ts";
import type { ResolvedListenOptions } from "../config/config.ts";

export type FetchHandler = (request: Request) => Response | Promise<Response>;

/**
 * The parts of `IncomingMessage` the adapter reads.
 */
export interface NodeRequestLike extends AsyncIterable<Uint8Array | string> {
  method?: string;
  url?: string;
  headers: IncomingHttpHeaders;
}

/**
 * The parts of `ServerResponse` the adapter writes.
 */
export interface NodeResponseLike {
  statusCode: number;
  readonly headersSent: boolean;
  setHeader(name: string, value: string | string[]): unknown;
  end(chunk: Uint8Array | string): unknown;
}

const BODYLESS_METHODS = new Set(["GET", "HEAD"]);

async function readBody(req: NodeRequestLike): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  for await (const chunk of req) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks);
}

/**
 * Resolve the request target against `origin`. A target starting with a
 * slash is appended as is, so "//a" keeps its empty first segment instead
 * of being read as a host.
 */
export function requestUrl(target: string, origin: string): URL {
  return target.startsWith("/")
    ? new URL(`${origin}${target}`)
    : new URL(target, origin);
}

export async function toWebRequest(
  req: NodeRequestLike,
  origin: string,
): Promise<Request> {
  const method = req.method ?? "GET";
  const url = requestUrl(req.url ?? "/", origin);

  const headers = new Headers();
  for (const [name, value] of Object.entries(req.headers)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      for (const item of value) headers.append(name, item);
    } else {
      headers.set(name, value);
    }
  }

  let body: BodyInit | undefined;
  if (!BODYLESS_METHODS.has(method)) {
    const bytes = await readBody(req);
    body = bytes.length > 0 ? bytes as BodyInit : undefined;
  }

  return new Request(url, { method, headers, body });
}

/**
 * Headers every response gets unless it sets them itself.
 */
export interface ResponseDefaults {
  serverName: string;
  contentType: string;
}

const RESPONSE_DEFAULTS: ResponseDefaults = {
  serverName: DEFAULT_SERVER_NAME,
  contentType: DEFAULT_CONTENT_TYPE,
};

/**
 * Copy `response` onto `res`. `Server` and `Date` are added when missing,
 * and `Content-Type` when there is a body without one.
 */
export async function writeWebResponse(
  res: NodeResponseLike,
  response: Response,
  defaults: ResponseDefaults = RESPONSE_DEFAULTS,
): Promise<void> {
  res.statusCode = response.status;

  const { headers } = response;
  if (!headers.has("server")) {
    res.setHeader("server", defaults.serverName);
  }
  if (!headers.has("date")) {
    res.setHeader("date", new Date().toUTCString());
  }
  if (response.body !== null && !headers.has("content-type")) {
    res.setHeader("content-type", defaults.contentType);
  }

  const cookies = response.headers.getSetCookie();
  if (cookies.length > 0) {
    res.setHeader("set-cookie", cookies);
  }
  response.headers.forEach((value, name) => {
    if (name !== "set-cookie") res.setHeader(name, value);
  });

  const body = response.body === null
    ? new Uint8Array(0)
    : new Uint8Array(await response.arrayBuffer());
  res.end(body);
}

export interface RequestListenerOptions extends Partial<ResponseDefaults> {
  /** Scheme and authority the request target is resolved against */
  origin: string;
  logger: Logger;
  development?: boolean;
}

/**
 * Build a listener for `http.createServer`. The returned promise settles
 * once the response is written and never rejects.
 */
export function createRequestListener(
  fetch: FetchHandler,
  options: RequestListenerOptions,
): (req: NodeRequestLike, res: NodeResponseLike) => Promise<void> {
  const { origin, logger, development = false } = options;
  const defaults: ResponseDefaults = {
    serverName: options.serverName ?? DEFAULT_SERVER_NAME,
    contentType: options.contentType ?? DEFAULT_CONTENT_TYPE,
  };

  return async (req, res) => {
    let request: Request;
    try {
      request = await toWebRequest(req, origin);
    } catch (error) {
      logger.warn("Malformed request", {
        url: req.url,
        error: error instanceof Error ? error.message : String(error),
      });
      await respond(
        res,
        new BadRequestError("Malformed request").toResponse(development),
        defaults,
        logger,
      );
      return;
    }

    let response: Response;
    try {
      response = await fetch(request);
    } catch (error) {
      logger.error("Unhandled error in fetch handler", {
        method: request.method,
        url: request.url,
        error: error instanceof Error ? error.message : String(error),
      });
      response = errorToResponse(error, development);
    }

    await respond(res, response, defaults, logger);
  };
}

async function respond(
  res: NodeResponseLike,
  response: Response,
  defaults: ResponseDefaults,
  logger: Logger,
): Promise<void> {
  try {
    await writeWebResponse(res, response, defaults);
  } catch (error) {
    logger.error("Failed to write response", {
      error: error instanceof Error ? error.message : String(error),
    });
    if (!res.headersSent) {
      res.statusCode = 500;
    }
    res.end("");
  }
}

function formatHost(hostname: string): string {
  return hostname.includes(":") ? `[${hostname}]` : hostname;
}

/**
 * Start a `node:http` server for `fetch` and resolve once it listens.
 */
export function serve(
  fetch: FetchHandler,
  options: ResolvedListenOptions,
  logger: Logger,
  development = false,
): Promise<ServerHandle> {
  const origin = `http://${formatHost(options.hostname)}:${options.port}`;
  const listener = createRequestListener(fetch, {
    origin,
    logger,
    development,
    serverName: options.serverName,
    contentType: options.contentType,
  });
  const server = createServer((req, res) => {
    void listener(req, res);
  });

  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(options.port, options.hostname, () => {
      server.off("error", reject);
      const address = server.address();
      const port = typeof address === "object" && address !== null
        ? address.port
        : options.port;

      resolve({
        port,
        hostname: options.hostname,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close((error) => error ? fail(error) : done());
            server.closeIdleConnections();
          }),
      });
    });
  });
}
