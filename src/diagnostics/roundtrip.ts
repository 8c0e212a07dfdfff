import { CODEC_CONFIG } from '../config';
import { DegenerateInputError } from '../codec/errors';
import { decode, encodeDirection } from '../codec/octahedral';
import { resolveRoundTripEpsilon } from '../env';
import type { Uv, Vec3 } from '../types';

export interface RoundTripSample {
  direction: Vec3;
  expected: Vec3;
  uv: Uv;
  decoded: Vec3;
  error: number;
  ok: boolean;
}

export interface RoundTripFailure {
  direction: Vec3;
  uv: null;
  decoded: null;
  error: number;
  ok: false;
  failure: string;
}

export type RoundTripEntry = RoundTripSample | RoundTripFailure;

export interface RoundTripCheckResult {
  ok: boolean;
  maxError: number;
  epsilon: number;
  results: RoundTripEntry[];
}

const normalized = (direction: Vec3): Vec3 => {
  const length = Math.hypot(direction.x, direction.y, direction.z);
  return { x: direction.x / length, y: direction.y / length, z: direction.z / length };
};

const checkSample = (direction: Vec3, epsilon: number): RoundTripEntry => {
  let uv: Uv;
  try {
    uv = encodeDirection(direction);
  } catch (error) {
    if (!(error instanceof DegenerateInputError)) {
      throw error;
    }
    return { direction, uv: null, decoded: null, error: Number.POSITIVE_INFINITY, ok: false, failure: error.message };
  }
  const decoded = decode(uv.u, uv.v);
  const expected = normalized(direction);
  const error = Math.max(
    Math.abs(decoded.x - expected.x),
    Math.abs(decoded.y - expected.y),
    Math.abs(decoded.z - expected.z)
  );
  return { direction, expected, uv, decoded, error, ok: error <= epsilon };
};

export const runRoundTripCheck = (
  samples: readonly Vec3[] = CODEC_CONFIG.directionSamples,
  options?: {
    epsilon?: number;
  }
): RoundTripCheckResult => {
  const epsilon = options?.epsilon ?? resolveRoundTripEpsilon();
  const results = samples.map((direction) => checkSample(direction, epsilon));
  const maxError = results.reduce((max, entry) => Math.max(max, entry.error), 0);
  const ok = results.every((entry) => entry.ok);
  return { ok, maxError, epsilon, results };
};
