import { describe, expect, it } from 'vitest';
import { OCTA_RESOLUTION_MULTIPLIER, clipToUv, getOctaExtent, texelCenterUv } from '../../src/codec/texel';

describe('clipToUv', () => {
  it('maps clip space onto the unit square', () => {
    expect(clipToUv(0, 0)).toEqual({ u: 0.5, v: 0.5 });
    expect(clipToUv(-1, 1)).toEqual({ u: 0, v: 1 });
    expect(clipToUv(0.5, -0.5)).toEqual({ u: 0.75, v: 0.25 });
  });

  it('discards positions outside the viewport', () => {
    expect(clipToUv(1.01, 0)).toBeNull();
    expect(clipToUv(0, -3)).toBeNull();
    expect(clipToUv(Number.NaN, 0)).toBeNull();
  });
});

describe('texelCenterUv', () => {
  it('samples the texel center', () => {
    expect(texelCenterUv(0, 0, 1, 1)).toEqual({ u: 0.5, v: 0.5 });
    expect(texelCenterUv(128, 128, 256, 256)).toEqual({ u: 0.501953125, v: 0.501953125 });
    expect(texelCenterUv(230, 25, 256, 256)).toEqual({ u: 0.900390625, v: 0.099609375 });
    expect(texelCenterUv(3, 1, 4, 2)).toEqual({ u: 0.875, v: 0.75 });
  });

  it('rejects invalid targets and texels', () => {
    expect(() => texelCenterUv(0, 0, 0, 4)).toThrow('invalid target size: 0x4');
    expect(() => texelCenterUv(0, 0, 4, 2.5)).toThrow(RangeError);
    expect(() => texelCenterUv(256, 0, 256, 256)).toThrow('texel (256, 0) outside 256x256 target');
    expect(() => texelCenterUv(-1, 0, 256, 256)).toThrow(RangeError);
    expect(() => texelCenterUv(1.5, 0, 256, 256)).toThrow(RangeError);
  });
});

describe('getOctaExtent', () => {
  it('doubles the cubemap face resolution by default', () => {
    expect(OCTA_RESOLUTION_MULTIPLIER).toBe(2);
    expect(getOctaExtent(128)).toBe(256);
    expect(getOctaExtent(64, 3)).toBe(192);
  });

  it('never returns less than one texel', () => {
    expect(getOctaExtent(0)).toBe(1);
    expect(getOctaExtent(0.3)).toBe(1);
    expect(getOctaExtent(-4)).toBe(1);
    expect(getOctaExtent(Number.NaN)).toBe(1);
    expect(getOctaExtent(16, Number.POSITIVE_INFINITY)).toBe(1);
  });
});
