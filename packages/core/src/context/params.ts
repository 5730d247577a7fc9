/**
 * Parsing of `a=1&b=2` parameter strings, as found in query strings and
 * urlencoded form bodies.
 */

function decodeComponent(text: string): string {
  const spaced = text.replaceAll("+", " ");
  try {
    return decodeURIComponent(spaced);
  } catch {
    return text;
  }
}

/**
 * Parse a parameter string into a record.
 *
 * - Empty parts (`a=1&&b=2`) are skipped
 * - A part without `=` gets the empty value
 * - Only the text up to a second `=` is taken as the value
 * - A later duplicate name overwrites the earlier one
 * - Malformed percent-escapes leave the raw text in place
 *
 * @example
 * ```typescript
 * parseParameters("q=tree+router&page=2"); // { q: "tree router", page: "2" }
 * ```
 */
export function parseParameters(source: string): Record<string, string> {
  const params: Record<string, string> = Object.create(null);
  const text = source.startsWith("?") ? source.slice(1) : source;

  for (const part of text.split("&")) {
    if (part === "") continue;
    const [name, value = ""] = part.split("=");
    params[decodeComponent(name)] = decodeComponent(value);
  }

  return params;
}
