import { afterEach, describe, expect, it } from 'vitest';
import { DEFAULT_CODEC_CONFIG } from '../src/config';
import { getRoundTripEpsilon, resolveRoundTripEpsilon } from '../src/env';

const originalEpsilon = process.env.OCTA_ROUNDTRIP_EPSILON;

afterEach(() => {
  if (originalEpsilon === undefined) {
    delete process.env.OCTA_ROUNDTRIP_EPSILON;
  } else {
    process.env.OCTA_ROUNDTRIP_EPSILON = originalEpsilon;
  }
});

describe('env', () => {
  it('parses the round-trip epsilon', () => {
    process.env.OCTA_ROUNDTRIP_EPSILON = '1e-4';
    expect(getRoundTripEpsilon()).toBeCloseTo(1e-4);
    process.env.OCTA_ROUNDTRIP_EPSILON = ' 0.5 ';
    expect(getRoundTripEpsilon()).toBe(0.5);
  });

  it('returns undefined for invalid or non-positive values', () => {
    process.env.OCTA_ROUNDTRIP_EPSILON = 'nope';
    expect(getRoundTripEpsilon()).toBeUndefined();
    process.env.OCTA_ROUNDTRIP_EPSILON = '0';
    expect(getRoundTripEpsilon()).toBeUndefined();
    process.env.OCTA_ROUNDTRIP_EPSILON = '-1';
    expect(getRoundTripEpsilon()).toBeUndefined();
  });

  it('returns undefined when unset', () => {
    process.env.OCTA_ROUNDTRIP_EPSILON = '';
    expect(getRoundTripEpsilon()).toBeUndefined();
    delete process.env.OCTA_ROUNDTRIP_EPSILON;
    expect(getRoundTripEpsilon()).toBeUndefined();
  });

  it('prefers the env value over config', () => {
    const config = { ...DEFAULT_CODEC_CONFIG, roundTripEpsilon: 0.25 };
    delete process.env.OCTA_ROUNDTRIP_EPSILON;
    expect(resolveRoundTripEpsilon(config)).toBe(0.25);
    process.env.OCTA_ROUNDTRIP_EPSILON = '0.01';
    expect(resolveRoundTripEpsilon(config)).toBe(0.01);
  });
});
