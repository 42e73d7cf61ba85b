/**
 * Reduces a caller-supplied post-login/post-logout destination to one on this
 * SP: a path starting with a single `/`, or an absolute URL on `publicBaseUrl`'s
 * origin (returned as path + query + hash). Anything else becomes `fallback`.
 */
export function safeRedirectTarget(raw: unknown, publicBaseUrl: string, fallback = "/"): string {
  if (typeof raw !== "string") return fallback;
  const value = raw.trim();
  if (value.length === 0) return fallback;
  // Browsers treat backslashes like slashes, so `/\evil.example` is protocol-relative.
  if (value.includes("\\") || /[\u0000-\u001f]/.test(value)) return fallback;

  if (value.startsWith("/")) {
    return value.startsWith("//") ? fallback : value;
  }

  let parsed: URL;
  let origin: string;
  try {
    parsed = new URL(value);
    origin = new URL(publicBaseUrl).origin;
  } catch {
    return fallback;
  }
  if (parsed.origin !== origin) return fallback;
  return `${parsed.pathname}${parsed.search}${parsed.hash}`;
}
