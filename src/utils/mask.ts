/**
 * Masks an API key for display: first 8 and last 4 characters stay visible.
 * Keys of 12 characters or fewer are masked entirely.
 */
export function maskApiKey(apiKey: string): string {
  if (!apiKey) return '';
  if (apiKey.length <= 12) return '*'.repeat(apiKey.length);
  return apiKey.slice(0, 8) + '*'.repeat(apiKey.length - 12) + apiKey.slice(-4);
}
