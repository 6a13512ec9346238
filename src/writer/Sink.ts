import { concatBytes } from '../binary.js';

/** Append-only byte sink tracking the current write offset. */
export interface Sink {
  readonly position: number;
  write(chunk: Uint8Array): void;
}

/** Collects written chunks in memory. */
export class BufferSink implements Sink {
  position = 0;
  private readonly chunks: Uint8Array[] = [];

  write(chunk: Uint8Array): void {
    if (chunk.length === 0) return;
    this.chunks.push(chunk);
    this.position += chunk.length;
  }

  toBytes(): Uint8Array {
    return concatBytes(this.chunks);
  }
}
