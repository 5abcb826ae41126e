/**
 * Map an http(s) endpoint onto its WebSocket scheme.
 *
 * Only the scheme prefix is rewritten; ws/wss URLs pass through.
 */
export function normalizeSocketUrl(url: string): string {
  const trimmed = url.trim();
  if (trimmed.startsWith('https')) {
    return `wss${trimmed.slice('https'.length)}`;
  }
  if (trimmed.startsWith('http')) {
    return `ws${trimmed.slice('http'.length)}`;
  }
  return trimmed;
}
