/**
 * Public URL helpers
 */

/**
 * Compose the public short URL for an ID: `{baseUrl}/{id}`.
 * Trailing slashes on the base are dropped so exactly one separator remains.
 *
 * @example
 * ```ts
 * buildShortUrl("http://localhost:8080/", "abc123"); // "http://localhost:8080/abc123"
 * ```
 */
export function buildShortUrl(baseUrl: string, id: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/${id}`;
}

/**
 * Check that a string is an absolute http(s) URL.
 */
export function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}
