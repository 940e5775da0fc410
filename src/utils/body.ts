/**
 * tapdeck — Body size ceiling
 *
 * Bodies above the ceiling are cut on a UTF-8 character boundary and
 * suffixed with a marker recording the original size in bytes.
 */

export const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;

const MARKER_PATTERN = /\n\[tapdeck: truncated, (\d+) bytes total\]$/;

export function truncationMarker(totalBytes: number): string {
  return `\n[tapdeck: truncated, ${totalBytes} bytes total]`;
}

/** Original size recorded by the truncation marker, or undefined if untruncated. */
export function truncatedSize(body: string): number | undefined {
  const match = MARKER_PATTERN.exec(body);
  return match ? Number(match[1]) : undefined;
}

/** Size of the body as captured, honouring the truncation marker. */
export function capturedSize(body: string | null): number {
  if (body === null) {
    return 0;
  }
  return truncatedSize(body) ?? Buffer.byteLength(body, 'utf8');
}

/**
 * Apply the size ceiling. Bodies already carrying a marker whose prefix fits
 * the ceiling are returned unchanged, so re-importing an export is lossless.
 */
export function truncateBody(body: string, maxBytes: number): string {
  const bytes = Buffer.byteLength(body, 'utf8');
  if (bytes <= maxBytes) {
    return body;
  }

  const match = MARKER_PATTERN.exec(body);
  if (match && Buffer.byteLength(body.slice(0, match.index), 'utf8') <= maxBytes) {
    return body;
  }

  const buf = Buffer.from(body, 'utf8');
  let cut = maxBytes;
  // Back up over UTF-8 continuation bytes (10xxxxxx) to a character start.
  while (cut > 0 && (buf[cut] & 0xc0) === 0x80) {
    cut--;
  }
  return buf.subarray(0, cut).toString('utf8') + truncationMarker(bytes);
}
