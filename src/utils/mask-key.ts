/**
 * Shorten an API key for log output
 */
export function maskKey(key: string): string {
  if (key.length <= 4) {
    return '****';
  }
  return `${key.slice(0, 4)}****`;
}
