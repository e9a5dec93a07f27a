/**
 * Encodes a value for use in a URL path. `/` is kept, so names such as
 * `openai/gpt-4o` reach the server as written.
 */
export function pathParam(value: string): string {
  return encodeURIComponent(value).replace(/%2F/gi, '/');
}
