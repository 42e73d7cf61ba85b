import type { FastifyInstance } from "fastify";

const PERMISSIONS_POLICY = [
  "accelerometer=()",
  "autoplay=()",
  "camera=()",
  "geolocation=()",
  "gyroscope=()",
  "magnetometer=()",
  "microphone=()",
  "payment=()",
  "usb=()"
].join(", ");

// Nothing served here loads scripts, styles or frames; the discovery page is plain HTML.
const BASELINE_HEADERS: ReadonlyArray<readonly [string, string]> = [
  ["x-dns-prefetch-control", "off"],
  ["x-download-options", "noopen"],
  ["x-content-type-options", "nosniff"],
  ["x-frame-options", "DENY"],
  ["x-robots-tag", "noindex"],
  ["referrer-policy", "no-referrer"],
  ["x-permitted-cross-domain-policies", "none"],
  ["content-security-policy", "default-src 'none'; frame-ancestors 'none'; base-uri 'none'; form-action 'none'"],
  ["cache-control", "no-store"],
  ["permissions-policy", PERMISSIONS_POLICY]
];

export function registerSecurityHeaders(app: FastifyInstance): void {
  // HSTS only when cookies are Secure, i.e. the SP is served over HTTPS.
  const enableHsts = app.config.cookieSecure;

  app.addHook("onSend", (_request, reply, payload, done) => {
    if (reply.hasHeader("server")) reply.removeHeader("server");

    // Only set headers when missing so individual endpoints can deliberately override them.
    for (const [name, value] of BASELINE_HEADERS) {
      if (!reply.hasHeader(name)) reply.header(name, value);
    }
    if (enableHsts && !reply.hasHeader("strict-transport-security")) {
      reply.header("strict-transport-security", "max-age=31536000; includeSubDomains");
    }

    done(null, payload);
  });
}
