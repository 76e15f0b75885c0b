// Base64url helpers and bit packing for grid snapshot layers

/**
 * Convert Uint8Array to base64url string.
 * Uses chunked processing to avoid stack overflow with large arrays.
 */
export function toBase64Url(bytes: Uint8Array): string {
  const CHUNK_SIZE = 0x8000; // 32KB chunks
  let binary = "";
  for (let i = 0; i < bytes.length; i += CHUNK_SIZE) {
    const chunk = bytes.subarray(i, Math.min(i + CHUNK_SIZE, bytes.length));
    binary += String.fromCharCode(...chunk);
  }
  const base64 = btoa(binary);
  return base64.replace(/\+/g, "-").replace(/\//g, "_").replace(/=+$/g, "");
}

/**
 * Convert base64url string to Uint8Array.
 */
export function fromBase64Url(input: string) {
  let base64 = input.replace(/-/g, "+").replace(/_/g, "/");
  while (base64.length % 4 !== 0) base64 += "=";
  const binary = atob(base64);
  const out = new Uint8Array(binary.length);
  for (let i = 0; i < binary.length; i++) out[i] = binary.charCodeAt(i);
  return out;
}

/**
 * Bit-pack an array of 0/1 cells into bytes (LSB-first within each byte).
 */
export function bitPack01(cells: Uint8Array) {
  const out = new Uint8Array(Math.ceil(cells.length / 8));
  for (let i = 0; i < cells.length; i++) {
    const cell = cells[i];
    if (cell !== undefined && cell & 1) {
      const byteIndex = i >> 3;
      out[byteIndex] = (out[byteIndex] ?? 0) | (1 << (i & 7));
    }
  }
  return out;
}

/**
 * Unpack bit-packed bytes back to 0/1 array.
 * @throws Error if packed array is too small for requested totalCells
 */
export function bitUnpack01(
  packed: Uint8Array,
  totalCells: number,
) {
  const requiredBytes = Math.ceil(totalCells / 8);
  if (packed.length < requiredBytes) {
    throw new Error(
      `Packed array too small: need ${requiredBytes} bytes for ${totalCells} cells, got ${packed.length}`,
    );
  }

  const out = new Uint8Array(totalCells);
  for (let i = 0; i < totalCells; i++) {
    const byte = packed[i >> 3];
    out[i] = byte !== undefined ? (byte >> (i & 7)) & 1 : 0;
  }
  return out;
}
