import { CODEC_CONFIG, type CodecConfig } from './config';

const readEnvNumber = (value: unknown): number | undefined => {
  const text = typeof value === 'string' ? value.trim() : '';
  if (text.length === 0) {
    return undefined;
  }
  const parsed = Number(text);
  if (!Number.isFinite(parsed)) {
    return undefined;
  }
  return parsed;
};

export const getRoundTripEpsilon = () => {
  const value = readEnvNumber(process.env.OCTA_ROUNDTRIP_EPSILON);
  if (value === undefined || value <= 0) {
    return undefined;
  }
  return value;
};

export const resolveRoundTripEpsilon = (config: CodecConfig = CODEC_CONFIG) =>
  getRoundTripEpsilon() ?? config.roundTripEpsilon;
