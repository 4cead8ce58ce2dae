/**
 * Runs `fn` and returns what it threw. Fails the test if nothing was thrown.
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('Expected the function to throw');
}

/** Header bytes as text, one character per byte. */
export function latin1(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => String.fromCharCode(b)).join('');
}

