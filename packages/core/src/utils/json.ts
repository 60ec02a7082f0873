/**
 * JSON utilities: parse without throwing, decode inbound frames.
 */

export interface ParseResult<T = unknown> {
  ok: true;
  value: T;
}

export interface ParseError {
  ok: false;
  error: string;
}

export type ParseOutcome<T = unknown> = ParseResult<T> | ParseError;

/**
 * Parse JSON safely. Returns a result object instead of throwing.
 */
export function safeJsonParse(data: string): ParseOutcome {
  try {
    const value: unknown = JSON.parse(data);
    return { ok: true, value };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, error: message };
  }
}

/**
 * Frame payload as delivered by websocket libraries: text, a single binary
 * buffer, or the fragments of one message.
 */
export type RawFrame = string | ArrayBuffer | Uint8Array | readonly Uint8Array[];

export function decodeFrame(raw: RawFrame): string {
  if (typeof raw === "string") return raw;
  const decoder = new TextDecoder();
  if (raw instanceof ArrayBuffer) return decoder.decode(new Uint8Array(raw));
  if (raw instanceof Uint8Array) return decoder.decode(raw);

  let text = "";
  for (const chunk of raw) {
    text += decoder.decode(chunk, { stream: true });
  }
  return text + decoder.decode();
}
