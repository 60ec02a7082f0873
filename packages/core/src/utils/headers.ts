/**
 * Header helpers for handshake metadata.
 */

export type HandshakeHeaders = Readonly<
  Record<string, string | readonly string[] | undefined>
>;

/**
 * First value of a header, looked up case-insensitively.
 */
export function headerValue(
  headers: HandshakeHeaders,
  name: string,
): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== wanted || value === undefined) continue;
    const first = typeof value === "string" ? value : value[0];
    if (first !== undefined && first.length > 0) return first;
  }
  return undefined;
}

/**
 * Best-effort client address: x-real-ip, then the first x-forwarded-for hop,
 * then the transport peer address.
 */
export function clientAddress(
  headers: HandshakeHeaders,
  peerAddress?: string | null,
): string | null {
  const realIp = headerValue(headers, "x-real-ip")?.trim();
  if (realIp) return realIp;
  const forwarded = headerValue(headers, "x-forwarded-for")
    ?.split(",")[0]
    ?.trim();
  if (forwarded) return forwarded;
  return peerAddress ?? null;
}

export function readCookie(
  headers: HandshakeHeaders,
  name: string,
): string | undefined {
  const cookie = headerValue(headers, "cookie");
  if (!cookie) return undefined;
  for (const part of cookie.split(";")) {
    const index = part.indexOf("=");
    if (index === -1) continue;
    if (part.slice(0, index).trim() !== name) continue;
    const value = part.slice(index + 1).trim();
    try {
      return decodeURIComponent(value);
    } catch {
      return value;
    }
  }
  return undefined;
}
