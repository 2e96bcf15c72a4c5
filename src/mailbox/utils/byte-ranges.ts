export interface ByteRange {
  start: number;
  length: number;
}

/**
 * Splits a message of `size` bytes into sequential ranges of at most
 * `chunkSize` bytes.
 *
 * @example
 * ```
 * planByteRanges(1000, 400) // [{start:0,length:400},{start:400,length:400},{start:800,length:200}]
 * ```
 */
export function planByteRanges(size: number, chunkSize: number): ByteRange[] {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new Error(`Invalid chunk size: ${chunkSize}`);
  }

  const ranges: ByteRange[] = [];
  for (let start = 0; start < size; start += chunkSize) {
    ranges.push({ start, length: Math.min(chunkSize, size - start) });
  }
  return ranges;
}
