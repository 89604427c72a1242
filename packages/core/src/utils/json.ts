// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * JSON utilities: frame-to-text conversion and safe parse with size checking.
 */

export type ParseOutcome =
  | { ok: true; value: unknown }
  | { ok: false; error: string };

export type RawFrame = string | ArrayBuffer | Uint8Array;

const decoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Byte length of a raw frame as it arrived on the wire.
 */
export function frameByteLength(data: RawFrame): number {
  if (typeof data === "string") return Buffer.byteLength(data, "utf8");
  return data.byteLength;
}

/**
 * Decode a raw frame to text. Throws on invalid UTF-8.
 */
export function frameToText(data: RawFrame): string {
  if (typeof data === "string") return data;
  return decoder.decode(data instanceof Uint8Array ? data : new Uint8Array(data));
}

/**
 * Parse JSON safely with optional size limit.
 * Returns a result object instead of throwing.
 */
export function safeJsonParse(data: RawFrame, maxBytes?: number): ParseOutcome {
  const size = frameByteLength(data);
  if (maxBytes !== undefined && size > maxBytes) {
    return {
      ok: false,
      error: `Message exceeds max payload size: ${size} > ${maxBytes}`,
    };
  }

  try {
    return { ok: true, value: JSON.parse(frameToText(data)) };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, error: message };
  }
}
