import type { Readable } from "node:stream";
import { CancelledError } from "./errors";

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) {
    return chunk;
  }
  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk);
  }
  return Buffer.from(String(chunk));
}

/**
 * Reads a stream to its end. The signal is checked before every chunk.
 * @throws {CancelledError} If the signal is aborted while reading
 */
export async function readStream(stream: Readable, signal?: AbortSignal): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    if (signal?.aborted) {
      throw new CancelledError();
    }
    chunks.push(toBuffer(chunk));
  }
  return Buffer.concat(chunks);
}

/**
 * Destroys the stream with a {@link CancelledError} once the signal aborts,
 * so the next read fails. Returns a function that detaches the listener.
 */
export function destroyOnAbort(stream: Readable, signal?: AbortSignal): () => void {
  if (!signal) {
    return () => {};
  }

  const onAbort = () => {
    stream.destroy(new CancelledError());
  };
  signal.addEventListener("abort", onAbort, { once: true });
  return () => signal.removeEventListener("abort", onAbort);
}

/**
 * @throws {CancelledError} If the signal is already aborted
 */
export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}
