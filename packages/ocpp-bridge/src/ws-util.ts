/**
 * WebSocket handshake helpers.
 *
 * Subprotocol parsing follows RFC 6455 Section 4.1 and
 * HTTP token rules from RFC 7230 Section 3.2.6.
 * Close code validation per RFC 6455 Section 7.4.
 */

import http from "node:http";
import type { Duplex } from "node:stream";

// ─── Subprotocol Parsing ────────────────────────────────────────

/**
 * RFC 7230 Section 3.2.6: tchar = "!" / "#" / "$" / "%" / "&" / "'" /
 * "*" / "+" / "-" / "." / "^" / "_" / "`" / "|" / "~" / DIGIT / ALPHA
 */
const TCHAR_SYMBOLS = new Set("!#$%&'*+-.^_`|~");

function isTChar(ch: string): boolean {
  return /^[A-Za-z0-9]$/.test(ch) || TCHAR_SYMBOLS.has(ch);
}

function isWhitespace(ch: string | undefined): boolean {
  return ch === " " || ch === "\t";
}

/**
 * Parse the `Sec-WebSocket-Protocol` header into an ordered Set of
 * protocol names. Duplicates, empty list members and invalid token
 * characters cause a SyntaxError.
 */
export function parseSubprotocols(header: string): Set<string> {
  const protocols = new Set<string>();

  for (const member of header.split(",")) {
    let start = 0;
    let end = member.length;
    while (start < end && isWhitespace(member[start])) start++;
    while (end > start && isWhitespace(member[end - 1])) end--;

    const token = member.slice(start, end);
    if (token.length === 0) {
      throw new SyntaxError("Unexpected end of input");
    }
    for (let i = 0; i < token.length; i++) {
      if (!isTChar(token.charAt(i))) {
        throw new SyntaxError(`Unexpected character "${token.charAt(i)}"`);
      }
    }
    if (protocols.has(token)) {
      throw new SyntaxError(`The "${token}" subprotocol is duplicated`);
    }
    protocols.add(token);
  }

  return protocols;
}

/**
 * First server-preferred protocol the device offered, or undefined.
 */
export function negotiateSubprotocol(
  offered: Set<string>,
  accepted: readonly string[],
): string | undefined {
  return accepted.find((p) => offered.has(p));
}

// ─── Close Code Validation ──────────────────────────────────────

/** Reserved close codes that MUST NOT be set in a Close frame. */
const RESERVED_CLOSE_CODES = new Set([1004, 1005, 1006]);

/**
 * Per RFC 6455 Section 7.4:
 * - 1000–1014 are valid (except 1004, 1005, 1006 which are reserved)
 * - 3000–4999 are available for application/library/framework use
 */
export function isValidStatusCode(code: number): boolean {
  if (code >= 1000 && code <= 1014 && !RESERVED_CLOSE_CODES.has(code)) {
    return true;
  }
  return code >= 3000 && code <= 4999;
}

// ─── Identity ───────────────────────────────────────────────────

/**
 * Device identity is the last non-empty path segment, URL-decoded.
 * Returns undefined when there is none or it cannot be decoded.
 */
export function identityFromPath(url: string | undefined): string | undefined {
  const pathname = (url ?? "").split("?")[0] ?? "";
  const segments = pathname.split("/").filter(Boolean);
  const last = segments[segments.length - 1];
  if (!last) return undefined;
  try {
    return decodeURIComponent(last) || undefined;
  } catch {
    return undefined;
  }
}

// ─── Handshake Abort ────────────────────────────────────────────

/**
 * Reject a WebSocket upgrade by sending an HTTP error response
 * to the raw socket and closing the connection.
 */
export function abortHandshake(
  socket: Duplex,
  statusCode: number,
  reason?: string,
  extraHeaders?: Record<string, string>,
): void {
  if (!socket.writable) return;

  const statusText = http.STATUS_CODES[statusCode] ?? "Unknown";
  const body = reason ?? statusText;

  const allHeaders: Record<string, string | number> = {
    Connection: "close",
    "Content-Type": "text/plain; charset=utf-8",
    "Content-Length": Buffer.byteLength(body, "utf8"),
    ...extraHeaders,
  };

  const headerBlock = Object.entries(allHeaders)
    .map(([k, v]) => `${k}: ${v}`)
    .join("\r\n");

  socket.end(
    `HTTP/1.1 ${statusCode} ${statusText}\r\n${headerBlock}\r\n\r\n${body}`,
  );
}
