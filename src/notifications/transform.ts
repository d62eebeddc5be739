/**
 * Notifications Module - Pure Transformations
 *
 * Builds the hand-framed HTTP request and classifies the response.
 * No side effects, no I/O - just data in, data out.
 */
import type { NotifyEndpoint } from "./schema.js";

const CRLF = "\r\n";

// =============================================================================
// Request Building
// =============================================================================

/**
 * Basic auth token: base64 of "user:password".
 */
export function basicAuthToken(user: string, password: string): string {
  return Buffer.from(`${user}:${password}`, "utf8").toString("base64");
}

/**
 * Form body. The message text is percent-encoded; the numbers are
 * written as "+<digits>".
 */
export function buildNotifyBody(
  to: string,
  from: string,
  prefix: string,
  message: string,
): string {
  return `To=+${to}&From=+${from}&Body=${encodeURIComponent(prefix + message)}`;
}

/**
 * Full HTTP/1.1 request text, headers and body.
 */
export function buildNotifyRequest(
  endpoint: Pick<
    NotifyEndpoint,
    "host" | "path" | "accountId" | "authToken" | "to" | "from" | "userAgent"
  >,
  prefix: string,
  message: string,
): string {
  const body = buildNotifyBody(endpoint.to, endpoint.from, prefix, message);

  return [
    `POST ${endpoint.path} HTTP/1.1`,
    `Authorization: Basic ${basicAuthToken(endpoint.accountId, endpoint.authToken)}`,
    `Host: ${endpoint.host}`,
    `User-Agent: ${endpoint.userAgent}`,
    "Accept: */*",
    "Content-Type: application/x-www-form-urlencoded",
    `Content-Length: ${Buffer.byteLength(body, "utf8")}`,
    "Connection: Close",
    "",
    body,
  ].join(CRLF);
}

// =============================================================================
// Response Classification
// =============================================================================

/**
 * Leading digit of the status code: the character after the first space
 * of the status line. Null until that character has arrived.
 */
export function readStatusDigit(response: string): string | null {
  const space = response.indexOf(" ");
  if (space === -1) return null;
  return response.charAt(space + 1) || null;
}

/**
 * Only a 2xx status counts as delivered.
 */
export function isSuccessDigit(digit: string | null): boolean {
  return digit === "2";
}
