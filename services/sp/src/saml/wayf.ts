import type { IdentityProviderSummary } from "./spConfig";

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#039;");
}

/**
 * Discovery ("where are you from") page listing the configured IdPs. Each
 * entry links back to the login endpoint with `idp` set and `next` preserved.
 */
export function renderWayfPage(options: { loginPath: string; next: string; idps: IdentityProviderSummary[] }): string {
  const items = options.idps
    .map((idp) => {
      const query = new URLSearchParams({ idp: idp.id, next: options.next });
      const href = `${options.loginPath}?${query.toString()}`;
      return `      <li><a href="${escapeHtml(href)}">${escapeHtml(idp.displayName)}</a></li>`;
    })
    .join("\n");

  return `<!DOCTYPE html>
<html>
  <head>
    <meta charset="UTF-8">
    <title>Select Identity Provider</title>
  </head>
  <body>
    <h1>Select your identity provider</h1>
    <ul>
${items}
    </ul>
  </body>
</html>
`;
}
