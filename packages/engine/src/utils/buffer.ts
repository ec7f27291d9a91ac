const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function fromString(text: string): Uint8Array {
  return encoder.encode(text);
}

export function decodeToString(data: Uint8Array): string {
  return decoder.decode(data);
}

export function concat(chunks: Uint8Array[]): Uint8Array {
  let total = 0;
  for (const chunk of chunks) {
    total += chunk.length;
  }
  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}

/** Index of the first occurrence of `sequence` in `buffer`, or -1. */
export function findSequence(buffer: Uint8Array, sequence: Uint8Array): number {
  outer: for (let i = 0; i <= buffer.length - sequence.length; i++) {
    for (let j = 0; j < sequence.length; j++) {
      if (buffer[i + j] !== sequence[j]) continue outer;
    }
    return i;
  }
  return -1;
}
