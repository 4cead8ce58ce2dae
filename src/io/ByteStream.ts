/**
 * Byte-addressable storage a session reads from or writes to.
 *
 * Reads and writes happen at the current position and advance it.
 */
export interface ByteStream {
  /** Moves the position to an absolute byte offset. */
  seek(offset: number): void;

  /** Current byte offset. */
  tell(): number;

  /**
   * Reads up to `length` bytes. Returns fewer at the end of the stream.
   */
  read(length: number): Uint8Array;

  write(data: Uint8Array): void;

  /** Cuts or extends the stream to `length` bytes. The position is left alone. */
  truncate(length: number): void;

  /** Total length of the stream in bytes. */
  size(): number;

  /** Releases the underlying resource. Further calls fail. */
  close(): void;
}

export function isByteStream(value: unknown): value is ByteStream {
  return (
    typeof value === 'object' &&
    value !== null &&
    'seek' in value &&
    typeof value.seek === 'function' &&
    'read' in value &&
    typeof value.read === 'function' &&
    'write' in value &&
    typeof value.write === 'function' &&
    'truncate' in value &&
    typeof value.truncate === 'function' &&
    'size' in value &&
    typeof value.size === 'function' &&
    'close' in value &&
    typeof value.close === 'function'
  );
}

const owned = new WeakSet<ByteStream>();

/**
 * Marks a stream as owned by an open session.
 * @returns false if another session already owns it.
 */
export function claimStream(stream: ByteStream): boolean {
  if (owned.has(stream)) return false;
  owned.add(stream);
  return true;
}

export function releaseStream(stream: ByteStream): void {
  owned.delete(stream);
}
