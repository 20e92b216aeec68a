// Read-ahead byte reader over a chunked source
// The buffer is preallocated and refilled from the source whenever it drains.

/**
 * Pull-based source of bytes. Returns the next chunk, or null once exhausted.
 * Empty chunks are allowed and skipped.
 */
export type ChunkSource = () => Uint8Array | null;

export type ByteSource = Uint8Array | number[] | ChunkSource;

function toUint8Array(bytes: number[]): Uint8Array {
  for (let i = 0; i < bytes.length; i++) {
    const b = bytes[i];
    if (!Number.isInteger(b) || b < 0 || b > 0xff) {
      throw new RangeError(`Value ${b} at index ${i} is not a byte`);
    }
  }
  return Uint8Array.from(bytes);
}

/**
 * Serve a byte array in chunks of at most chunkSize bytes
 */
export function fromBytes(bytes: Uint8Array | number[], chunkSize: number = bytes.length): ChunkSource {
  const data = bytes instanceof Uint8Array ? bytes : toUint8Array(bytes);
  const size = Math.max(1, chunkSize);
  let offset = 0;
  return () => {
    if (offset >= data.length) return null;
    const chunk = data.subarray(offset, offset + size);
    offset += chunk.length;
    return chunk;
  };
}

export function fromChunks(chunks: Iterable<Uint8Array>): ChunkSource {
  const iterator = chunks[Symbol.iterator]();
  return () => {
    const next = iterator.next();
    return next.done ? null : next.value;
  };
}

export function toChunkSource(source: ByteSource): ChunkSource {
  if (typeof source === 'function') return source;
  return fromBytes(source);
}

export class ByteReader {
  private source: ChunkSource;
  private buffer: Uint8Array;
  private length: number = 0;
  private processed: number = 0;
  private pending: Uint8Array | null = null;
  private pendingOffset: number = 0;
  private exhausted: boolean = false;
  private consumed: number = 0;
  private refills: number = 0;

  constructor(source: ByteSource, bufferSize: number = 1024) {
    if (!Number.isInteger(bufferSize) || bufferSize <= 0) {
      throw new RangeError(`Buffer size must be a positive integer, got ${bufferSize}`);
    }
    this.source = toChunkSource(source);
    this.buffer = new Uint8Array(bufferSize);
  }

  /**
   * Next byte without consuming it, or null at end of source
   */
  peek(): number | null {
    if (!this.ensure()) return null;
    return this.buffer[this.processed];
  }

  /**
   * Consume the next byte, or return null at end of source
   */
  read(): number | null {
    if (!this.ensure()) return null;
    this.consumed++;
    return this.buffer[this.processed++];
  }

  // Offset of the next byte to be read within the whole stream
  get position(): number {
    return this.consumed;
  }

  get refillCount(): number {
    return this.refills;
  }

  private ensure(): boolean {
    if (this.processed === this.length) {
      this.fill();
    }
    return this.length > 0;
  }

  private fill(): void {
    this.processed = 0;
    this.length = 0;

    while (this.length < this.buffer.length) {
      if (this.pending === null || this.pendingOffset >= this.pending.length) {
        if (this.exhausted) break;
        const next = this.source();
        if (next === null) {
          this.exhausted = true;
          break;
        }
        this.pending = next;
        this.pendingOffset = 0;
        continue;
      }

      const count = Math.min(
        this.buffer.length - this.length,
        this.pending.length - this.pendingOffset
      );
      this.buffer.set(this.pending.subarray(this.pendingOffset, this.pendingOffset + count), this.length);
      this.length += count;
      this.pendingOffset += count;
    }

    if (this.length > 0) {
      this.refills++;
    }
  }
}
