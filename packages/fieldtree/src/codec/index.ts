export { decodeResponse } from "./decode";
export { encodeResponse } from "./encode";
export { readFragment } from "./fragments";
export { createScalarRegistry } from "./scalars";
export type { CodecOptions, DecodeResult, PendingDeferral } from "./decode";
export type { ScalarCodec, ScalarRegistry } from "./scalars";
