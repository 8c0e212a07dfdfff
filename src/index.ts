export { decode, decodeUv, encode, encodeDirection, type DecodeOptions } from './codec/octahedral';
export { DegenerateInputError, type CodecOperation } from './codec/errors';
export { checkUvRange, formatOutOfRangeWarning, isUvInRange, type OutOfRangeWarning } from './codec/range';
export { clipToUv, getOctaExtent, OCTA_RESOLUTION_MULTIPLIER, texelCenterUv } from './codec/texel';
export { classifyDirection, CubeFace, faceColor, faceLabel, type FaceColor } from './cubemap/faces';
export { previewFace, previewFaces, type FacePreview } from './cubemap/preview';
export { CODEC_CONFIG, DEFAULT_CODEC_CONFIG, parseCodecConfig, type CodecConfig } from './config';
export { getRoundTripEpsilon, resolveRoundTripEpsilon } from './env';
export {
  runRoundTripCheck,
  type RoundTripCheckResult,
  type RoundTripEntry,
  type RoundTripFailure,
  type RoundTripSample
} from './diagnostics/roundtrip';
export {
  defaultLogger,
  listFacePreviewRows,
  listRoundTripRows,
  printFacePreview,
  printRoundTripReport,
  type FacePreviewRow,
  type RoundTripRow
} from './diagnostics/report';
export type { Logger, TablePrinter, Uv, Vec3 } from './types';
