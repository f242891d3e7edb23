/**
 * HTML for the login dashboard. Every interpolated value is escaped.
 */

const REFRESH_SECONDS = 5;

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function layout(body: string, refresh: boolean): string {
  const meta = refresh ? `\n    <meta http-equiv="refresh" content="${REFRESH_SECONDS}" />` : '';
  return `<!DOCTYPE html>
<html>
  <head>
    <meta charset="utf-8" />${meta}
    <title>SphereBridge</title>
  </head>
  <body>
${body}
  </body>
</html>
`;
}

const logoutForm = `    <form method="post" action="/logout"><button type="submit">Log out</button></form>`;

export function renderPending(code: string, expiresAt: number, notice?: string): string {
  const expires = new Date(expiresAt).toISOString();
  const noticeHtml = notice ? `    <p>${escapeHtml(notice)}</p>\n` : '';
  return layout(
    `${noticeHtml}    <h1>Code: ${escapeHtml(code)}</h1>
    <p>Enter this code under Quick Connect in a signed-in Jellyfin app. It expires at ${escapeHtml(expires)}.</p>`,
    true
  );
}

/** Shown exactly once, right after approval */
export function renderCredentials(username: string, password: string): string {
  return layout(
    `    <h1>User: ${escapeHtml(username)}</h1>
    <h1>Pass: ${escapeHtml(password)}</h1>
    <p>Enter these in HereSphere. The password is not shown again; log out to get a new one.</p>
    <h2><a href="/heresphere">HereSphere</a></h2>
${logoutForm}`,
    false
  );
}

export function renderDashboard(username: string): string {
  return layout(
    `    <h1>User: ${escapeHtml(username)}</h1>
    <p>Signed in. Log out and sign in again if you need a new password.</p>
    <h2><a href="/heresphere">HereSphere</a></h2>
${logoutForm}`,
    false
  );
}

export function renderUnavailable(): string {
  return layout(`    <h1>Temporarily unavailable</h1>
    <p>The media server or the gateway's storage cannot be reached. This page retries automatically.</p>`, true);
}
