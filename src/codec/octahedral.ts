import type { Logger, Uv, Vec3 } from '../types';
import { DegenerateInputError } from './errors';
import { checkUvRange, formatOutOfRangeWarning } from './range';

export interface DecodeOptions {
  logger?: Logger;
}

// Floor for the L1 norm before projecting onto the octahedron.
const L1_EPSILON = 1e-5;
const DEGENERATE_LENGTH_EPSILON = 1e-12;

// Zero (either sign) counts as positive; this decides which corner a boundary point folds to.
const signNotZero = (value: number) => (value >= 0 ? 1 : -1);

// Reflects across the diamond edge; the map is its own inverse.
const fold = (x: number, y: number): [number, number] => [
  (1 - Math.abs(y)) * signNotZero(x),
  (1 - Math.abs(x)) * signNotZero(y)
];

// Y is the polar axis: +Y lands on the center, -Y on the four corners.
export const encode = (x: number, y: number, z: number): Uv => {
  if (!Number.isFinite(x) || !Number.isFinite(y) || !Number.isFinite(z)) {
    throw new DegenerateInputError(`cannot encode direction (${x}, ${y}, ${z})`, 'encode', Math.hypot(x, y, z));
  }
  // Scale by the largest component first so hypot cannot overflow.
  const scale = Math.max(Math.abs(x), Math.abs(y), Math.abs(z));
  const scaledLength = scale > 0 ? Math.hypot(x / scale, y / scale, z / scale) : 0;
  const length = scale * scaledLength;
  if (length <= DEGENERATE_LENGTH_EPSILON) {
    throw new DegenerateInputError(`cannot encode direction (${x}, ${y}, ${z})`, 'encode', length);
  }

  const octX = x / scale / scaledLength;
  const octY = z / scale / scaledLength;
  const octZ = y / scale / scaledLength;

  const denom = Math.max(Math.abs(octX) + Math.abs(octY) + Math.abs(octZ), L1_EPSILON);
  let px = octX / denom;
  let py = octY / denom;
  if (octZ < 0) {
    [px, py] = fold(px, py);
  }

  return { u: px * 0.5 + 0.5, v: py * 0.5 + 0.5 };
};

// uv outside [0, 1] is decoded as-is; a logger, when given, is warned.
export const decode = (u: number, v: number, options: DecodeOptions = {}): Vec3 => {
  if (!Number.isFinite(u) || !Number.isFinite(v)) {
    throw new DegenerateInputError(`cannot decode uv (${u}, ${v})`, 'decode', Number.NaN);
  }
  if (options.logger) {
    const warning = checkUvRange(u, v);
    if (warning) {
      options.logger.warn(formatOutOfRangeWarning(warning));
    }
  }

  const fx = u * 2 - 1;
  const fy = v * 2 - 1;
  const nz = 1 - Math.abs(fx) - Math.abs(fy);
  let nx = fx;
  let ny = fy;
  if (nz < 0) {
    [nx, ny] = fold(nx, ny);
  }

  const length = Math.hypot(nx, nz, ny);
  if (!Number.isFinite(length) || length <= 0) {
    throw new DegenerateInputError(`cannot decode uv (${u}, ${v})`, 'decode', length);
  }
  return { x: nx / length, y: nz / length, z: ny / length };
};

export const encodeDirection = (direction: Vec3): Uv => encode(direction.x, direction.y, direction.z);

export const decodeUv = (uv: Uv, options?: DecodeOptions): Vec3 => decode(uv.u, uv.v, options);

export const __test = { signNotZero, fold, L1_EPSILON, DEGENERATE_LENGTH_EPSILON };
