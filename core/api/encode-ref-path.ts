/**
 * Percent-encode a branch or tag name for use in a URL path, keeping `/`
 * between its segments.
 *
 * @param name - Branch or tag name.
 * @returns Encoded path.
 */
export function encodeRefPath(name: string): string {
  return name.split('/').map(encodeURIComponent).join('/')
}
