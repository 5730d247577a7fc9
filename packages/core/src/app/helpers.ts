const TEXT_CONTENT_TYPE = "text/plain; charset=utf-8";
const OCTET_CONTENT_TYPE = "application/octet-stream";
const TEXT_HEADERS: HeadersInit = { "Content-Type": TEXT_CONTENT_TYPE };
const BINARY_HEADERS: HeadersInit = { "Content-Type": OCTET_CONTENT_TYPE };

export const TEXT_INIT_200: ResponseInit = { headers: TEXT_HEADERS };
export const BINARY_INIT_200: ResponseInit = { headers: BINARY_HEADERS };
export const NOT_FOUND_INIT: ResponseInit = {
  status: 404,
  headers: TEXT_HEADERS,
};
export const NOT_FOUND_BODY = "Not Found";

/**
 * Join a base path and a route path with exactly one slash between them.
 */
export function joinPath(base: string, path: string): string {
  const normalizedPath = path.startsWith("/") ? path : `/${path}`;
  if (base === "/" || base === "") {
    return normalizedPath;
  }
  const normalizedBase = base.endsWith("/") ? base.slice(0, -1) : base;
  return normalizedPath === "/"
    ? normalizedBase
    : `${normalizedBase}${normalizedPath}`;
}

const SLASH_BYTE = 0x2f;
const HEX_PAIR = /^[0-9a-fA-F]{2}$/;
const utf8 = new TextDecoder();

function hexByte(text: string, index: number): number | null {
  const pair = text.slice(index, index + 2);
  return HEX_PAIR.test(pair) ? Number.parseInt(pair, 16) : null;
}

/**
 * Percent-decode a request path for matching.
 *
 * Every escape is decoded except `%2F`, so a decoded slash never splits a
 * segment. Runs of escaped bytes are read as UTF-8 and invalid sequences
 * become U+FFFD. A `%` that does not start an escape is kept as is.
 */
export function decodePath(pathname: string): string {
  if (!pathname.includes("%")) {
    return pathname;
  }

  let decoded = "";
  let bytes: number[] = [];
  const flush = () => {
    if (bytes.length > 0) {
      decoded += utf8.decode(new Uint8Array(bytes));
      bytes = [];
    }
  };

  let i = 0;
  while (i < pathname.length) {
    if (pathname[i] === "%") {
      const byte = hexByte(pathname, i + 1);
      if (byte !== null && byte !== SLASH_BYTE) {
        bytes.push(byte);
        i += 3;
        continue;
      }
    }
    flush();
    decoded += pathname[i];
    i++;
  }
  flush();

  return decoded;
}

/**
 * Convert whatever a handler returned into a Response.
 *
 * - `Response`: as is
 * - `null` / `undefined`: 204
 * - string: text/plain
 * - bytes or a stream: application/octet-stream
 * - anything else: JSON
 */
export function resultToResponse(result: unknown): Response {
  if (result instanceof Response) {
    return result;
  }

  if (result == null) {
    return new Response(null, { status: 204 });
  }

  if (typeof result === "string") {
    return new Response(result, TEXT_INIT_200);
  }

  if (
    result instanceof Uint8Array ||
    result instanceof ArrayBuffer ||
    result instanceof ReadableStream
  ) {
    return new Response(result as BodyInit, BINARY_INIT_200);
  }

  return Response.json(result);
}
