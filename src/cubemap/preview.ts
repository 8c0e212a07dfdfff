import { decodeUv, type DecodeOptions } from '../codec/octahedral';
import type { Uv, Vec3 } from '../types';
import { classifyDirection, faceColor, faceLabel, type CubeFace, type FaceColor } from './faces';

export interface FacePreview {
  uv: Uv;
  direction: Vec3;
  face: CubeFace | null;
  label: string;
  color: FaceColor | null;
}

export const previewFace = (uv: Uv, options?: DecodeOptions): FacePreview => {
  const direction = decodeUv(uv, options);
  const face = classifyDirection(direction.x, direction.y, direction.z);
  return {
    uv,
    direction,
    face,
    label: face === null ? '?' : faceLabel(face),
    color: face === null ? null : faceColor(face)
  };
};

export const previewFaces = (uvs: readonly Uv[], options?: DecodeOptions) =>
  uvs.map((uv) => previewFace(uv, options));
