import type { OpenMode, SessionOptions } from './types';
import { SphereSession, type SessionTarget } from './SphereSession';
import { WaveAdapter } from './WaveAdapter';

export interface OpenOptions extends SessionOptions {
  /** Return a `WaveAdapter` over the session instead of the session itself. */
  isWavelike?: boolean;
}

/**
 * Opens a SPHERE file or stream.
 *
 * @example
 * const sph = open('utterance.sph');
 * const samples = sph.readsamples(sph.getparams().sample_count);
 * sph.close();
 */
export function open(target: SessionTarget, mode: OpenMode, options: OpenOptions & { isWavelike: true }): WaveAdapter;
export function open(target: SessionTarget, mode?: OpenMode, options?: OpenOptions & { isWavelike?: false }): SphereSession;
export function open(target: SessionTarget, mode?: OpenMode, options?: OpenOptions): SphereSession | WaveAdapter;
export function open(target: SessionTarget, mode: OpenMode = 'r', options: OpenOptions = {}): SphereSession | WaveAdapter {
  const { isWavelike = false, ...sessionOptions } = options;
  const session = new SphereSession(sessionOptions).open(target, mode);
  return isWavelike ? new WaveAdapter(session) : session;
}

/**
 * Runs `fn` with an open session and closes it afterwards, also when `fn` throws.
 * In write mode the file is finalized on the way out.
 */
export function withSphere<T>(
  target: SessionTarget,
  mode: OpenMode,
  fn: (session: SphereSession) => T,
  options: SessionOptions = {}
): T {
  const session = new SphereSession(options).open(target, mode);
  try {
    return fn(session);
  } finally {
    session.close();
  }
}
