import rawConfig from '../config/codec.json';
import type { Uv, Vec3 } from './types';

export interface CodecConfig {
  roundTripEpsilon: number;
  directionSamples: Vec3[];
  uvSamples: Uv[];
}

export const DEFAULT_CODEC_CONFIG: CodecConfig = {
  roundTripEpsilon: 1e-6,
  directionSamples: [
    { x: 1, y: 0, z: 0 },
    { x: 0, y: 1, z: 0 },
    { x: 0, y: 0, z: 1 }
  ],
  uvSamples: [{ u: 0.5, v: 0.5 }]
};

const readNumber = (value: unknown) => (typeof value === 'number' && Number.isFinite(value) ? value : null);

const readPositiveNumber = (value: unknown) => {
  const parsed = readNumber(value);
  return parsed !== null && parsed > 0 ? parsed : null;
};

const readTuple = (value: unknown, size: number): number[] | null => {
  if (!Array.isArray(value) || value.length !== size) {
    return null;
  }
  const numbers: number[] = [];
  for (const entry of value) {
    const parsed = readNumber(entry);
    if (parsed === null) {
      return null;
    }
    numbers.push(parsed);
  }
  return numbers;
};

const readSamples = <T>(value: unknown, size: number, build: (tuple: number[]) => T): T[] | null => {
  if (!Array.isArray(value)) {
    return null;
  }
  const samples: T[] = [];
  for (const entry of value) {
    const tuple = readTuple(entry, size);
    if (tuple) {
      samples.push(build(tuple));
    }
  }
  return samples.length > 0 ? samples : null;
};

export const parseCodecConfig = (value: unknown): CodecConfig => {
  if (typeof value !== 'object' || value === null) {
    return DEFAULT_CODEC_CONFIG;
  }
  const record = value as Record<string, unknown>;
  const roundTripEpsilon = readPositiveNumber(record.roundTripEpsilon) ?? DEFAULT_CODEC_CONFIG.roundTripEpsilon;
  const directionSamples =
    readSamples(record.directionSamples, 3, ([x, y, z]) => ({ x, y, z })) ??
    DEFAULT_CODEC_CONFIG.directionSamples;
  const uvSamples =
    readSamples(record.uvSamples, 2, ([u, v]) => ({ u, v })) ?? DEFAULT_CODEC_CONFIG.uvSamples;
  return {
    roundTripEpsilon,
    directionSamples,
    uvSamples
  };
};

export const CODEC_CONFIG = parseCodecConfig(rawConfig);
