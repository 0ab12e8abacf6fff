/**
 * Utf8Fold.ts - Fold two-byte UTF-8 sequences to the single-byte codes
 * the fonts are indexed by (Latin-1 plus 0x80 for the Euro sign).
 *
 * Anything outside the C2/C3 leads and the Euro sequence is dropped.
 */

export interface Utf8FoldState {
  /** Last byte >= 0x80 seen, 0 after an ASCII byte */
  pendingLead: number;
}

export function createUtf8FoldState(): Utf8FoldState {
  return { pendingLead: 0 };
}

/**
 * Feed one byte. Returns the folded code, or null when the byte is swallowed.
 */
export function foldUtf8Byte(state: Utf8FoldState, c: number): number | null {
  const byte = c & 0xff;
  if (byte < 0x80) {
    state.pendingLead = 0;
    return byte;
  }

  const last = state.pendingLead;
  state.pendingLead = byte;

  switch (last) {
    case 0xc2:
      return byte;
    case 0xc3:
      return byte | 0xc0;
    case 0x82:
      // Euro sign (E2 82 AC)
      if (byte === 0xac) return 0x80;
      break;
  }
  return null;
}

const encoder = new TextEncoder();

/**
 * Fold a whole string or byte sequence. A caller-supplied state carries
 * a pending lead byte across chunks of the same stream.
 */
export function foldUtf8(
  input: string | Uint8Array,
  state: Utf8FoldState = createUtf8FoldState(),
): Uint8Array {
  const bytes = typeof input === "string" ? encoder.encode(input) : input;
  const out = new Uint8Array(bytes.length);
  let k = 0;
  for (const byte of bytes) {
    const code = foldUtf8Byte(state, byte);
    // NUL is dropped along with unmapped bytes
    if (code !== null && code !== 0) out[k++] = code;
  }
  return out.slice(0, k);
}
