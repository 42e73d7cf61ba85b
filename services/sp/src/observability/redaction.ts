/**
 * Strips the query string from a request URL.
 *
 * Query params carry `SAMLRequest`, `SAMLResponse`, `Signature` and the
 * post-login destination on the redirect binding.
 */
export function sanitizeUrlPath(rawUrl: string): string {
  return rawUrl.split("?")[0] ?? rawUrl;
}
