export enum CubeFace {
  PositiveX = 0,
  NegativeX = 1,
  PositiveY = 2,
  NegativeY = 3,
  PositiveZ = 4,
  NegativeZ = 5
}

export type FaceColor = readonly [number, number, number];

const FACE_LABELS: readonly string[] = ['+X', '-X', '+Y', '-Y', '+Z', '-Z'];

const FACE_COLORS: readonly FaceColor[] = [
  [1, 0, 0],
  [0, 1, 0],
  [0, 0, 1],
  [1, 1, 0],
  [1, 0, 1],
  [0, 1, 1]
];

export const faceLabel = (face: CubeFace) => FACE_LABELS[face] ?? '?';

export const faceColor = (face: CubeFace): FaceColor => FACE_COLORS[face] ?? [0, 0, 0];

// Ties resolve X before Y before Z.
export const classifyDirection = (x: number, y: number, z: number): CubeFace | null => {
  if (!Number.isFinite(x) || !Number.isFinite(y) || !Number.isFinite(z)) {
    return null;
  }
  const ax = Math.abs(x);
  const ay = Math.abs(y);
  const az = Math.abs(z);
  if (ax === 0 && ay === 0 && az === 0) {
    return null;
  }
  if (ax >= ay && ax >= az) {
    return x >= 0 ? CubeFace.PositiveX : CubeFace.NegativeX;
  }
  if (ay >= az) {
    return y >= 0 ? CubeFace.PositiveY : CubeFace.NegativeY;
  }
  return z >= 0 ? CubeFace.PositiveZ : CubeFace.NegativeZ;
};
