export { SphereSession, isWriteMode, type SessionTarget } from './SphereSession';
export { WaveAdapter } from './WaveAdapter';
export { open, withSphere, type OpenOptions } from './open';
export { sphereToWav, wavToSphere } from './convert';

export { parseSphereHeader, readHeaderSize } from './parseSphereHeader';
export { serializeSphereHeader, formatHeaderField } from './serializeSphereHeader';
export { decodePCM } from './decoders/pcm/decodePCM';
export { encodePCM } from './encoders/pcm/encodePCM';
export { resolveByteOrder, defaultByteFormat, type ByteOrder } from './utils/byte-format';
export {
  KNOWN_FIELD_TYPES,
  sphereParamsSchema,
  sessionOptionsSchema,
  validateSphereParams,
} from './format-validation';

export { type ByteStream } from './io/ByteStream';
export { FileStream } from './io/FileStream';
export { MemoryStream } from './io/MemoryStream';
export { SessionState } from './core/StateMachine';

export * from './errors';
export * from './constants';
export type * from './types';
