/**
 * Drain an async byte stream and return how many bytes it produced.
 * String chunks (a stream with an encoding set) are counted as UTF-8.
 * Rejects with the stream's error if it fails part way; the bytes read so far are discarded.
 */
export async function countStreamBytes(stream: AsyncIterable<Uint8Array | string>): Promise<number> {
  let total = 0;
  for await (const chunk of stream) {
    total += typeof chunk === "string" ? Buffer.byteLength(chunk) : chunk.byteLength;
  }
  return total;
}
