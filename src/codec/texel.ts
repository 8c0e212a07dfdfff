import type { Uv } from '../types';

export const OCTA_RESOLUTION_MULTIPLIER = 2;

const inClipRange = (value: number) => Number.isFinite(value) && value >= -1 && value <= 1;

// null where the fullscreen pass would discard the fragment.
export const clipToUv = (clipX: number, clipY: number): Uv | null => {
  if (!inClipRange(clipX) || !inClipRange(clipY)) {
    return null;
  }
  return { u: clipX * 0.5 + 0.5, v: clipY * 0.5 + 0.5 };
};

const isPositiveInteger = (value: number) => Number.isInteger(value) && value > 0;

export const texelCenterUv = (px: number, py: number, width: number, height: number): Uv => {
  if (!isPositiveInteger(width) || !isPositiveInteger(height)) {
    throw new RangeError(`invalid target size: ${width}x${height}`);
  }
  if (!Number.isInteger(px) || !Number.isInteger(py) || px < 0 || py < 0 || px >= width || py >= height) {
    throw new RangeError(`texel (${px}, ${py}) outside ${width}x${height} target`);
  }
  return { u: (px + 0.5) / width, v: (py + 0.5) / height };
};

export const getOctaExtent = (baseResolution: number, multiplier = OCTA_RESOLUTION_MULTIPLIER) => {
  if (!Number.isFinite(baseResolution) || baseResolution < 0 || !Number.isFinite(multiplier)) {
    return 1;
  }
  return Math.max(1, Math.floor(baseResolution * multiplier));
};
